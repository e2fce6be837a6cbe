import { z } from "zod";
import { defineCalculator, flag, int, lookup, num, round, text } from "./base.js";
import type { ToolData, ToolInput } from "./base.js";

const OPEN_BENCHMARKS: Record<string, number> = {
  SaaS: 21.5,
  "E-commerce": 15.7,
  "B2B Services": 20.1,
  Media: 22.3,
  Healthcare: 23.4,
  Finance: 20.5,
  Other: 19.0,
};

const CLICK_BENCHMARKS: Record<string, number> = {
  SaaS: 3.1,
  "E-commerce": 2.3,
  "B2B Services": 3.4,
  Media: 4.2,
  Healthcare: 3.8,
  Finance: 2.9,
  Other: 2.6,
};

const deliverabilityInput = z.object({
  bounce_rate_pct: num(0),
  spam_complaint_rate_pct: num(0),
  has_spf: flag(),
  has_dkim: flag(),
  has_dmarc: flag(),
});

/** Authentication 30, bounce rate 35, spam complaints 35. */
function deliverability(input: ToolInput): ToolData {
  const parsed = deliverabilityInput.parse(input);
  const bounce = parsed.bounce_rate_pct;
  const spam = parsed.spam_complaint_rate_pct;
  const issues: string[] = [];

  const auth = (parsed.has_spf ? 10 : 0) + (parsed.has_dkim ? 10 : 0) + (parsed.has_dmarc ? 10 : 0);
  if (!parsed.has_spf) issues.push("Set up SPF record to authenticate sending domain.");
  if (!parsed.has_dkim) issues.push("Enable DKIM signing in your ESP.");
  if (!parsed.has_dmarc) issues.push("Publish a DMARC policy (start with p=none for monitoring).");

  let bounceScore: number;
  if (bounce <= 0.5) {
    bounceScore = 35;
  } else if (bounce <= 2) {
    bounceScore = 25;
    issues.push(`Bounce rate ${bounce}% is elevated. Clean list with email verification.`);
  } else if (bounce <= 5) {
    bounceScore = 12;
    issues.push(`High bounce rate ${bounce}% — urgent list cleaning required.`);
  } else {
    bounceScore = 0;
    issues.push(`Critical bounce rate ${bounce}% — ESPs will block sending. Pause and clean.`);
  }

  let spamScore: number;
  if (spam <= 0.08) {
    spamScore = 35;
  } else if (spam <= 0.2) {
    spamScore = 20;
    issues.push(`Spam complaints ${spam}% approaching danger zone. Review content and list quality.`);
  } else {
    spamScore = 5;
    issues.push(`Spam complaint rate ${spam}% is critical — ISPs will blacklist your domain.`);
  }

  const score = auth + bounceScore + spamScore;
  let rating: string;
  if (score >= 85) rating = "Excellent";
  else if (score >= 65) rating = "Good";
  else if (score >= 40) rating = "At risk";
  else rating = "Critical";

  return {
    calc_type: "deliverability_score",
    deliverability_score: score,
    rating,
    authentication: { SPF: parsed.has_spf, DKIM: parsed.has_dkim, DMARC: parsed.has_dmarc },
    bounce_rate_pct: bounce,
    spam_complaint_rate_pct: spam,
    issues: issues.length > 0 ? issues : ["Deliverability health is excellent."],
  };
}

const openRateInput = z.object({ open_rate_pct: num(0), industry: text("Other") });

function openRateBenchmark(input: ToolInput): ToolData {
  const { open_rate_pct: actual, industry } = openRateInput.parse(input);
  const benchmark = lookup(OPEN_BENCHMARKS, industry, OPEN_BENCHMARKS.Other);
  const delta = round(actual - benchmark, 1);

  return {
    calc_type: "open_rate_benchmark",
    actual_open_rate_pct: actual,
    industry_benchmark_pct: benchmark,
    industry,
    delta_vs_benchmark: delta,
    performance: delta >= 0 ? "Above benchmark" : "Below benchmark",
    tips: [
      actual < benchmark
        ? "A/B test subject lines with curiosity, urgency, or personalisation."
        : "Maintain subject line strategy.",
      "Segment list by engagement level — send re-engagement campaign to cold subscribers.",
      "Test send times: Tue-Thu, 10 AM or 2 PM recipient local time typically outperform.",
    ],
  };
}

const clickRateInput = z.object({ click_rate_pct: num(0), industry: text("Other") });

function clickRateBenchmark(input: ToolInput): ToolData {
  const { click_rate_pct: actual, industry } = clickRateInput.parse(input);
  const benchmark = lookup(CLICK_BENCHMARKS, industry, CLICK_BENCHMARKS.Other);
  const delta = round(actual - benchmark, 1);

  return {
    calc_type: "click_rate_benchmark",
    actual_click_rate_pct: actual,
    industry_benchmark_pct: benchmark,
    industry,
    delta_vs_benchmark: delta,
    performance: delta >= 0 ? "Above benchmark" : "Below benchmark",
    tips:
      actual < benchmark
        ? [
            "Use a single, prominent CTA button rather than multiple text links.",
            "Add urgency: 'Offer expires in 48 hours' or 'Only 3 spots remaining'.",
            "Personalise email content using segmentation data.",
          ]
        : ["CTR is performing well. Test adding a secondary CTA."],
  };
}

const revenueInput = z.object({
  emails_sent: int(1),
  conversion_rate_pct: num(1),
  average_order_value: num(0),
});

function revenuePerEmail(input: ToolInput): ToolData {
  const parsed = revenueInput.parse(input);
  const sent = Math.max(1, parsed.emails_sent);
  const conversions = Math.round(sent * (parsed.conversion_rate_pct / 100));
  const totalRevenue = round(conversions * parsed.average_order_value, 2);

  return {
    calc_type: "revenue_per_email",
    revenue_per_email: round(totalRevenue / sent, 4),
    total_revenue: totalRevenue,
    estimated_conversions: conversions,
    emails_sent: sent,
    conversion_rate_pct: parsed.conversion_rate_pct,
    aov: parsed.average_order_value,
    benchmark: "Strong email programmes generate $0.05-$0.20 RPE. World-class: >$1.00 RPE.",
  };
}

const listHealthInput = z.object({
  list_size: int(1),
  bounce_rate_pct: num(0),
  spam_complaint_rate_pct: num(0),
  unsubscribe_rate_pct: num(0),
  open_rate_pct: num(0),
  list_age_months: int(12),
});

function listHealth(input: ToolInput): ToolData {
  const parsed = listHealthInput.parse(input);
  const recommendations: string[] = [];
  let score = 100;

  if (parsed.bounce_rate_pct > 2) {
    score -= 25;
    recommendations.push("Run list through email verification service (ZeroBounce, NeverBounce).");
  } else if (parsed.bounce_rate_pct > 0.5) {
    score -= 10;
  }

  if (parsed.spam_complaint_rate_pct > 0.1) {
    score -= 25;
    recommendations.push("High spam complaints — suppress unengaged contacts, improve targeting.");
  } else if (parsed.spam_complaint_rate_pct > 0.05) {
    score -= 10;
  }

  if (parsed.unsubscribe_rate_pct > 0.5) {
    score -= 20;
    recommendations.push("High unsubscribes — check send frequency and content relevance.");
  } else if (parsed.unsubscribe_rate_pct > 0.2) {
    score -= 8;
  }

  if (parsed.open_rate_pct < 10) {
    score -= 20;
    recommendations.push("Very low engagement — segment and re-permission cold contacts.");
  } else if (parsed.open_rate_pct < 15) {
    score -= 8;
  }

  if (parsed.list_age_months > 24) {
    score -= 10;
    recommendations.push("Old list — run re-engagement campaign and remove non-responders.");
  }

  score = Math.max(0, score);
  return {
    calc_type: "list_health_score",
    list_health_score: score,
    list_size: Math.max(1, parsed.list_size),
    health_rating: score >= 75 ? "Healthy" : score >= 50 ? "Fair" : "At risk",
    recommendations:
      recommendations.length > 0
        ? recommendations
        : ["List health is excellent. Maintain regular cleaning cadence."],
  };
}

const sequenceInput = z.object({
  list_size: int(1),
  sequence_emails: int(5),
  cost_per_email_send: num(0.001),
  sequence_conversions: int(0),
  average_order_value: num(0),
});

function sequenceRoi(input: ToolInput): ToolData {
  const parsed = sequenceInput.parse(input);
  const totalSends = Math.max(1, parsed.list_size) * Math.max(1, parsed.sequence_emails);
  const totalCost = round(totalSends * parsed.cost_per_email_send, 2);
  const totalRevenue = round(parsed.sequence_conversions * parsed.average_order_value, 2);
  const roi = round(((totalRevenue - totalCost) / Math.max(0.01, totalCost)) * 100, 1);

  let rating: string;
  if (roi >= 500) rating = "Excellent";
  else if (roi >= 200) rating = "Good";
  else if (roi >= 50) rating = "Acceptable";
  else rating = "Needs improvement";

  return {
    calc_type: "sequence_roi",
    sequence_roi_pct: roi,
    total_revenue: totalRevenue,
    total_cost: totalCost,
    net_profit: round(totalRevenue - totalCost, 2),
    revenue_per_email: round(totalRevenue / totalSends, 4),
    total_sends: totalSends,
    conversions: parsed.sequence_conversions,
    rating,
  };
}

export const emailCampaignManager = defineCalculator("email_campaign_manager", {
  deliverability_score: deliverability,
  open_rate_benchmark: openRateBenchmark,
  click_rate_benchmark: clickRateBenchmark,
  revenue_per_email: revenuePerEmail,
  list_health_score: listHealth,
  sequence_roi: sequenceRoi,
});
