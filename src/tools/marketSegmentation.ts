import { z } from "zod";
import { clamp, defineCalculator, formatDollars, int, lookup, num, round, text } from "./base.js";
import type { ToolData, ToolInput } from "./base.js";

const COMPETITION_PENALTY: Record<string, number> = {
  Low: 0,
  Medium: 10,
  High: 20,
  "Extremely High": 35,
};

const SEGMENT_BASELINE = 25;

const sizingInput = z.object({
  total_companies_in_market: int(0),
  average_deal_value: num(0),
  serviceable_fraction_pct: num(30),
  obtainable_fraction_pct: num(5),
});

function tam(input: ToolInput): ToolData {
  const parsed = sizingInput.parse(input);
  const dollars = round(parsed.total_companies_in_market * parsed.average_deal_value, 2);
  return {
    calc_type: "tam_estimate",
    tam_dollars: dollars,
    tam_formatted: formatDollars(dollars),
    total_companies: parsed.total_companies_in_market,
    average_deal_value: parsed.average_deal_value,
    note: "TAM = total revenue opportunity if you captured 100% of the market.",
  };
}

function sam(input: ToolInput): ToolData {
  const parsed = sizingInput.parse(input);
  const total = parsed.total_companies_in_market * parsed.average_deal_value;
  const dollars = round((total * parsed.serviceable_fraction_pct) / 100, 2);
  return {
    calc_type: "sam_estimate",
    sam_dollars: dollars,
    sam_formatted: formatDollars(dollars),
    tam_dollars: round(total, 2),
    serviceable_pct: parsed.serviceable_fraction_pct,
    note: "SAM = the portion of TAM your current GTM model can reach.",
  };
}

function som(input: ToolInput): ToolData {
  const parsed = sizingInput.parse(input);
  const companies = parsed.total_companies_in_market;
  const serviceable = (companies * parsed.average_deal_value * parsed.serviceable_fraction_pct) / 100;
  const dollars = round((serviceable * parsed.obtainable_fraction_pct) / 100, 2);
  return {
    calc_type: "som_estimate",
    som_dollars: dollars,
    som_formatted: formatDollars(dollars),
    sam_dollars: round(serviceable, 2),
    obtainable_pct: parsed.obtainable_fraction_pct,
    target_customers: Math.round(
      (((companies * parsed.serviceable_fraction_pct) / 100) * parsed.obtainable_fraction_pct) / 100
    ),
    note: "SOM = realistic revenue target achievable with current resources in 3-5 years.",
  };
}

const penetrationInput = z.object({
  current_customers: int(0),
  total_companies_in_market: int(1),
});

function penetration(input: ToolInput): ToolData {
  const parsed = penetrationInput.parse(input);
  const total = Math.max(1, parsed.total_companies_in_market);
  const rate = round((parsed.current_customers / total) * 100, 3);

  let interpretation: string;
  if (rate > 30) interpretation = "Market leader position.";
  else if (rate > 10) interpretation = "Strong penetration — focus on expansion revenue.";
  else if (rate > 2) interpretation = "Growth stage — significant greenfield opportunity remains.";
  else interpretation = "Early stage — prioritise acquisition and product-market fit signals.";

  return {
    calc_type: "market_penetration_rate",
    penetration_rate_pct: rate,
    current_customers: parsed.current_customers,
    total_addressable_companies: total,
    interpretation,
  };
}

const segmentInput = z.object({
  segment_growth_rate_pct: num(5),
  avg_deal_cycle_days: num(90),
  competition_intensity: text("Medium"),
  differentiation_score: num(5),
});

/** Baseline 25, growth up to 30, short cycles up to 25, differentiation up to 20, minus competition. */
function segmentScore(input: ToolInput): ToolData {
  const parsed = segmentInput.parse(input);
  const penalty = lookup(COMPETITION_PENALTY, parsed.competition_intensity, COMPETITION_PENALTY.Medium);
  const growthScore = Math.min(30, parsed.segment_growth_rate_pct * 1.5);
  const cycleScore = Math.max(0, 25 - parsed.avg_deal_cycle_days / 10);
  const diffScore = clamp(parsed.differentiation_score, 0, 10) * 2;
  const total = clamp(round(SEGMENT_BASELINE + growthScore + cycleScore + diffScore - penalty, 1), 0, 100);

  let rating: string;
  let recommendation: string;
  if (total >= 70) {
    rating = "Priority segment";
    recommendation = "Prioritise this segment in next quarter's GTM plan.";
  } else if (total >= 45) {
    rating = "Secondary segment";
    recommendation = "Include in product roadmap and secondary marketing campaigns.";
  } else {
    rating = "Low priority";
    recommendation = "Deprioritise — low growth, high competition, or long cycles.";
  }

  return {
    calc_type: "ideal_segment_score",
    segment_attractiveness_score: total,
    rating,
    breakdown: {
      growth_score: round(growthScore, 1),
      deal_cycle_score: round(cycleScore, 1),
      differentiation_score: round(diffScore, 1),
      competition_penalty: -penalty,
      baseline: SEGMENT_BASELINE,
    },
    recommendation,
  };
}

export const marketSegmentation = defineCalculator("market_segmentation", {
  tam_estimate: tam,
  sam_estimate: sam,
  som_estimate: som,
  market_penetration_rate: penetration,
  ideal_segment_score: segmentScore,
});
