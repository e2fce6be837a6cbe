import { z } from "zod";
import { clamp, defineCalculator, flag, int, lookup, num, round, text } from "./base.js";
import type { ToolData, ToolInput } from "./base.js";

const OPTIMAL_WORD_COUNT: Record<string, string> = {
  blog_post: "1500-2500",
  landing_page: "500-1500",
  email: "150-300",
  social_post: "50-150",
  video_script: "750-1500",
  whitepaper: "3000-6000",
};

const readabilityInput = z.object({
  word_count: int(500),
  avg_sentence_length: num(18),
  avg_syllables_per_word: num(1.5),
  content_type: text("blog_post"),
});

/** Flesch Reading Ease from average sentence length and syllables per word. */
function readability(input: ToolInput): ToolData {
  const parsed = readabilityInput.parse(input);
  const avgSentence = parsed.avg_sentence_length;
  const avgSyllables = parsed.avg_syllables_per_word;
  const fre = clamp(round(206.835 - 1.015 * avgSentence - 84.6 * avgSyllables, 1), 0, 100);

  let gradeLevel: string;
  if (fre >= 70) gradeLevel = "Easy (6th-8th grade) — Good for broad audience.";
  else if (fre >= 50) gradeLevel = "Standard (9th-12th grade) — Good for B2B tech content.";
  else if (fre >= 30) gradeLevel = "Difficult (College level) — Consider simplifying.";
  else gradeLevel = "Very Difficult — Rewrite for clarity.";

  return {
    calc_type: "readability_score",
    flesch_reading_ease: fre,
    grade_level: gradeLevel,
    word_count: Math.max(1, parsed.word_count),
    optimal_word_count_for_type: lookup<string>(OPTIMAL_WORD_COUNT, parsed.content_type, "varies"),
    recommendations: [
      avgSentence > 22 ? "Shorten sentences to <20 words average." : "Sentence length is good.",
      avgSyllables > 1.6
        ? "Simplify vocabulary — aim for <1.4 avg syllables/word."
        : "Vocabulary complexity is appropriate.",
    ],
  };
}

const densityInput = z.object({
  word_count: int(500),
  keyword_count: int(0),
});

function keywordDensity(input: ToolInput): ToolData {
  const parsed = densityInput.parse(input);
  const words = Math.max(1, parsed.word_count);
  const density = round((parsed.keyword_count / words) * 100, 2);

  let status: string;
  let recommendation: string;
  if (density < 0.5) {
    status = "Under-optimised";
    recommendation = "Add keyword naturally 2-3 more times.";
  } else if (density <= 2) {
    status = "Optimal (0.5-2%)";
    recommendation = "Good keyword density — maintain balance.";
  } else if (density <= 3) {
    status = "Slightly over-optimised";
    recommendation = "Consider replacing 1-2 instances with synonyms.";
  } else {
    status = "Keyword stuffing risk";
    recommendation = "Reduce occurrences — risk of Google penalty.";
  }

  return {
    calc_type: "keyword_density",
    keyword_density_pct: density,
    occurrences: parsed.keyword_count,
    word_count: words,
    status,
    recommendation,
    optimal_range: "0.5-2.0%",
  };
}

const gapInput = z.object({
  target_keywords: z.array(z.coerce.string()).default([]),
  covered_keywords: z.array(z.coerce.string()).default([]),
});

function contentGap(input: ToolInput): ToolData {
  const parsed = gapInput.parse(input);
  const target = new Set(parsed.target_keywords.map((k) => k.toLowerCase()));
  const covered = new Set(parsed.covered_keywords.map((k) => k.toLowerCase()));
  const gaps = [...target].filter((k) => !covered.has(k)).sort();
  const coveredCount = [...target].filter((k) => covered.has(k)).length;
  const coveragePct = round((coveredCount / Math.max(1, target.size)) * 100, 1);

  return {
    calc_type: "content_gap_analysis",
    coverage_pct: coveragePct,
    total_target_topics: target.size,
    covered_topics: coveredCount,
    gap_topics: gaps,
    score_rating: coveragePct >= 80 ? "Comprehensive" : coveragePct >= 60 ? "Adequate" : "Significant gaps",
    action:
      gaps.length > 0
        ? `Add sections covering: ${gaps.slice(0, 5).join(", ")}${gaps.length > 5 ? "..." : ""}.`
        : "All target topics are covered.",
  };
}

const metaInput = z.object({
  meta_title_length: int(0),
  meta_description_length: int(0),
  meta_title_has_keyword: flag(),
});

function metaScore(input: ToolInput): ToolData {
  const parsed = metaInput.parse(input);
  const titleLength = parsed.meta_title_length;
  const descriptionLength = parsed.meta_description_length;
  const issues: string[] = [];
  let score = 0;

  if (titleLength >= 50 && titleLength <= 60) {
    score += 40;
  } else if (titleLength >= 40 && titleLength <= 70) {
    score += 25;
    issues.push(`Title length ${titleLength} chars — optimal is 50-60.`);
  } else {
    score += 10;
    issues.push(`Title length ${titleLength} chars is outside optimal range (50-60).`);
  }

  if (descriptionLength >= 120 && descriptionLength <= 155) {
    score += 35;
  } else if (descriptionLength >= 100 && descriptionLength <= 170) {
    score += 20;
    issues.push(`Description ${descriptionLength} chars — optimal is 120-155.`);
  } else {
    score += 5;
    issues.push(`Description ${descriptionLength} chars is outside optimal range.`);
  }

  if (parsed.meta_title_has_keyword) score += 25;
  else issues.push("Primary keyword missing from meta title — add it near the front.");

  return {
    calc_type: "meta_score",
    meta_score: score,
    rating: score >= 85 ? "Excellent" : score >= 65 ? "Good" : "Needs improvement",
    issues: issues.length > 0 ? issues : ["All meta fields are well-optimised."],
    title_length: titleLength,
    description_length: descriptionLength,
    keyword_in_title: parsed.meta_title_has_keyword,
  };
}

const headlineInput = z.object({
  headline_text: z.coerce.string().default(""),
  power_word_count: int(0),
});

function headlinePower(input: ToolInput): ToolData {
  const parsed = headlineInput.parse(input);
  const headline = parsed.headline_text;
  const wordCount = headline.split(/\s+/).filter(Boolean).length;
  const powerWords = parsed.power_word_count;

  const lengthScore = wordCount >= 6 && wordCount <= 12 ? 30 : wordCount <= 16 ? 20 : 10;
  const powerScore = Math.min(35, powerWords * 10);
  const hasNumber = /\d/.test(headline);
  const numberScore = hasNumber ? 20 : 5;
  const triggerScore = headline.trim().endsWith("?") || headline.toLowerCase().includes("how") ? 15 : 0;
  const total = Math.min(100, lengthScore + powerScore + numberScore + triggerScore);

  return {
    calc_type: "headline_power_score",
    headline_power_score: total,
    headline,
    word_count: wordCount,
    power_words_detected: powerWords,
    rating: total >= 70 ? "High impact" : total >= 45 ? "Average" : "Weak",
    tips: [
      hasNumber
        ? "Good — headline contains a specific number."
        : "Add a specific number (e.g. '7 Ways...' or '$50K in 90 days').",
      powerWords < 2
        ? "Include power/emotional words: 'proven', 'secret', 'ultimate', 'guaranteed'."
        : "Good power word usage.",
      wordCount < 6 || wordCount > 12
        ? "Aim for 6-12 word headlines for maximum click-through."
        : "Headline length is optimal.",
    ],
  };
}

export const contentOptimizer = defineCalculator("content_optimizer", {
  readability_score: readability,
  keyword_density: keywordDensity,
  content_gap_analysis: contentGap,
  meta_score: metaScore,
  headline_power_score: headlinePower,
});
