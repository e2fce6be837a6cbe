import { z } from "zod";
import { clamp, defineCalculator, int, num, round, text } from "./base.js";
import type { ToolData, ToolInput } from "./base.js";

/** Organic click-through rate (%) by SERP position. */
const CTR_BY_POSITION: ReadonlyArray<readonly [number, number]> = [
  [1, 28.5],
  [2, 15.7],
  [3, 11.0],
  [4, 8.0],
  [5, 7.2],
  [6, 5.1],
  [7, 4.0],
  [8, 3.2],
  [9, 2.8],
  [10, 2.5],
];

const daInput = z.object({
  domain_age_years: num(1),
  referring_domains: int(0),
  total_backlinks: int(0),
});

/** Log-scaled authority model: age up to 20, referring domains up to 50, backlinks up to 30. */
function domainAuthority(input: ToolInput): ToolData {
  const parsed = daInput.parse(input);
  const ageFactor = Math.min(20, Math.log1p(parsed.domain_age_years) * 7);
  const rdFactor = Math.min(50, Math.log1p(parsed.referring_domains) * 8);
  const blFactor = Math.min(30, Math.log1p(parsed.total_backlinks) * 4);
  const da = Math.min(99, round(ageFactor + rdFactor + blFactor, 1));

  return {
    calc_type: "domain_authority_estimate",
    estimated_da: da,
    tier:
      da >= 60 ? "High authority (DA 60+)" : da >= 30 ? "Medium authority (DA 30-60)" : "Low authority (DA <30)",
    age_contribution: round(ageFactor, 1),
    referring_domains_contribution: round(rdFactor, 1),
    backlinks_contribution: round(blFactor, 1),
    growth_tip: "Focus on earning 5-10 new high-quality referring domains per month to accelerate DA growth.",
  };
}

const difficultyInput = z.object({
  keyword: text(""),
  competition_score: num(0.5),
  search_volume: int(0),
});

function keywordDifficulty(input: ToolInput): ToolData {
  const parsed = difficultyInput.parse(input);
  const competition = clamp(parsed.competition_score, 0, 1);
  const volumeFactor = Math.min(30, Math.log1p(parsed.search_volume) * 2.5);
  const kd = Math.min(100, round(competition * 70 + volumeFactor, 1));

  let label: string;
  let strategy: string;
  if (kd >= 70) {
    label = "Hard";
    strategy = "Target long-tail variants first. Build authority over 12+ months.";
  } else if (kd >= 40) {
    label = "Medium";
    strategy = "Competitive but achievable in 6-12 months with quality content + links.";
  } else {
    label = "Easy";
    strategy = "Quick win — create comprehensive content and expect results in 2-4 months.";
  }

  return {
    calc_type: "keyword_difficulty",
    keyword: parsed.keyword,
    keyword_difficulty_score: kd,
    difficulty_label: label,
    strategy,
    search_volume: parsed.search_volume,
    competition_score: competition,
  };
}

const trafficInput = z.object({
  search_volume: int(0),
  ctr_estimate_pct: num(5),
});

function trafficPotential(input: ToolInput): ToolData {
  const { search_volume: volume, ctr_estimate_pct: ctr } = trafficInput.parse(input);
  const byPosition = new Map(CTR_BY_POSITION.map(([position, rate]) => [position, Math.round((volume * rate) / 100)]));
  const visits = (position: number) => (byPosition.get(position) ?? 0).toLocaleString("en-US");

  return {
    calc_type: "traffic_potential",
    search_volume: volume,
    estimated_traffic_at_input_ctr: Math.round((volume * ctr) / 100),
    ctr_used_pct: ctr,
    traffic_by_ranking_position: Object.fromEntries(byPosition),
    recommendation:
      `Ranking #1 would yield ~${visits(1)} monthly visitors. ` + `Even position #5 delivers ~${visits(5)} visits.`,
  };
}

const velocityInput = z.object({
  new_backlinks_this_month: int(0),
  new_backlinks_last_month: int(1),
});

function backlinkVelocity(input: ToolInput): ToolData {
  const parsed = velocityInput.parse(input);
  const thisMonth = parsed.new_backlinks_this_month;
  const lastMonth = Math.max(1, parsed.new_backlinks_last_month);
  const velocity = round(((thisMonth - lastMonth) / lastMonth) * 100, 1);

  return {
    calc_type: "backlink_velocity",
    velocity_pct_mom: velocity,
    this_month: thisMonth,
    last_month: lastMonth,
    trend: velocity > 10 ? "Accelerating" : velocity > 0 ? "Growing" : "Declining",
    note:
      "Natural, steady backlink growth signals quality to search engines. " +
      "Sudden spikes (>200% MoM) can trigger spam filters.",
  };
}

const rankInput = z.object({
  current_da: num(20),
  top_ranking_da_avg: num(60),
  content_quality_score: num(50),
});

function rankProbability(input: ToolInput): ToolData {
  const parsed = rankInput.parse(input);
  const quality = clamp(parsed.content_quality_score, 0, 100);
  const daRatio = Math.min(1, parsed.current_da / Math.max(1, parsed.top_ranking_da_avg));
  const probability = clamp(round((daRatio * 0.55 + (quality / 100) * 0.45) * 100, 1), 2, 95);

  let recommendation: string;
  if (probability >= 60) recommendation = "Strong chance to rank. Publish and promote actively.";
  else if (probability >= 35)
    recommendation = "Moderate chance. Invest in link building and content depth before targeting.";
  else recommendation = "Low probability currently. Build DA and improve content before targeting this keyword.";

  return {
    calc_type: "rank_probability",
    page1_rank_probability_pct: probability,
    current_da: parsed.current_da,
    competitor_avg_da: parsed.top_ranking_da_avg,
    content_quality_score: quality,
    recommendation,
  };
}

export const seoAnalyzer = defineCalculator("seo_analyzer", {
  domain_authority_estimate: domainAuthority,
  keyword_difficulty: keywordDifficulty,
  traffic_potential: trafficPotential,
  backlink_velocity: backlinkVelocity,
  rank_probability: rankProbability,
});
