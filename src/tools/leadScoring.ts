import { z } from "zod";
import { clamp, defineCalculator, flag, int, lookup, num, round, text } from "./base.js";
import type { ToolData, ToolInput } from "./base.js";

const IDEAL_COMPANY_SIZE_MIN = 50;
const IDEAL_COMPANY_SIZE_MAX = 5000;

const SENIORITY_WEIGHTS: Record<string, number> = {
  "C-Suite": 1.0,
  VP: 0.9,
  Director: 0.75,
  Manager: 0.55,
  "Individual Contributor": 0.3,
  Unknown: 0.2,
};

const BUDGET_WEIGHTS: Record<string, number> = {
  "<$10k": 0.1,
  "$10k-$50k": 0.4,
  "$50k-$200k": 0.75,
  "$200k-$1M": 0.95,
  ">$1M": 1.0,
  Unknown: 0.15,
};

function seniorityWeight(title: string): number {
  return lookup<number>(SENIORITY_WEIGHTS, title, 0.2);
}

function budgetWeight(budget: string): number {
  return lookup<number>(BUDGET_WEIGHTS, budget, 0.15);
}

/** Keys whose condition holds, in insertion order. */
function flagged(conditions: Record<string, boolean>): string[] {
  return Object.entries(conditions)
    .filter(([, hit]) => hit)
    .map(([label]) => label);
}

const iltInput = z.object({
  company_size: int(0),
  industry: text(""),
  title_seniority: text("Unknown"),
  engagement_signals: int(0),
});

/** Ideal Lead Template: firmographic fit 40, seniority 35, engagement 25. */
function iltScore(input: ToolInput): ToolData {
  const { company_size, industry, title_seniority, engagement_signals } = iltInput.parse(input);

  let firmographic: number;
  if (company_size >= IDEAL_COMPANY_SIZE_MIN && company_size <= IDEAL_COMPANY_SIZE_MAX) firmographic = 40;
  else if (company_size > IDEAL_COMPANY_SIZE_MAX) firmographic = 35;
  else if (company_size > 10) firmographic = 20;
  else firmographic = 5;

  const seniority = seniorityWeight(title_seniority) * 35;
  // diminishing returns
  const engagement = Math.min(25, Math.log1p(engagement_signals) * 5.5);
  const score = round(Math.min(100, firmographic + seniority + engagement), 1);

  let tier: string;
  let action: string;
  if (score >= 75) {
    tier = "A — Hot";
    action = "Route to AE immediately. Add to Tier-1 sequence.";
  } else if (score >= 55) {
    tier = "B — Warm";
    action = "Enroll in nurture sequence. SDR follow-up within 24 h.";
  } else if (score >= 35) {
    tier = "C — Cool";
    action = "Long-nurture sequence. Marketing-qualified only.";
  } else {
    tier = "D — Unqualified";
    action = "Do not work. Return to awareness campaigns.";
  }

  return {
    calc_type: "ilt_score",
    ilt_score: score,
    tier,
    breakdown: {
      firmographic_fit_40pts: round(firmographic, 1),
      title_seniority_35pts: round(seniority, 1),
      engagement_signals_25pts: round(engagement, 1),
    },
    recommended_action: action,
    inputs: { company_size, industry, title_seniority, engagement_signals },
  };
}

const bantInput = z.object({
  budget_range: text("Unknown"),
  title_seniority: text("Unknown"),
  pain_score: int(0),
  timeline_months: num(12),
});

function bantQualify(input: ToolInput): ToolData {
  const parsed = bantInput.parse(input);
  const pain = clamp(parsed.pain_score, 0, 10);
  const timeline = parsed.timeline_months;

  const budget = budgetWeight(parsed.budget_range) * 25;
  const authority = seniorityWeight(parsed.title_seniority) * 25;
  const need = (pain / 10) * 25;
  let timing: number;
  if (timeline <= 1) timing = 25;
  else if (timeline <= 3) timing = 20;
  else if (timeline <= 6) timing = 14;
  else if (timeline <= 12) timing = 8;
  else timing = 3;

  const total = round(budget + authority + need + timing, 1);
  const qualified = total >= 60;

  return {
    calc_type: "bant_qualify",
    bant_total_score: total,
    qualified,
    qualification_status: qualified ? "SQL — Sales Qualified Lead" : "MQL — Needs further nurturing",
    breakdown: {
      Budget_25pts: round(budget, 1),
      Authority_25pts: round(authority, 1),
      Need_25pts: round(need, 1),
      Timeline_25pts: round(timing, 1),
    },
    gaps: flagged({
      "Budget clarity": budget < 10,
      "Economic buyer confirmed": authority < 12,
      "Clear pain identified": need < 12,
      "Active buying timeline": timing < 8,
    }),
    next_steps: qualified
      ? "Progress to demo / proposal. Assign AE and create deal in CRM."
      : "Schedule discovery call to map stakeholders and confirm budget.",
  };
}

const meddicInput = z.object({
  pain_score: int(0),
  decision_maker_confirmed: flag(),
  champion_identified: flag(),
  budget_range: text("Unknown"),
  engagement_signals: int(0),
});

function meddicScore(input: ToolInput): ToolData {
  const parsed = meddicInput.parse(input);
  const pain = clamp(parsed.pain_score, 0, 10);
  const engagement = parsed.engagement_signals;

  const metrics = round((pain / 10) * 17, 1);
  const economicBuyer = parsed.decision_maker_confirmed ? 17 : 4;
  // criteria and process are approximated from engagement volume
  const decisionCriteria = round(Math.min(17, engagement * 1.2), 1);
  const decisionProcess = round(Math.min(17, engagement * 0.9), 1);
  const identifyPain = round((pain / 10) * 16, 1);
  const champion = parsed.champion_identified ? 16 : 3;

  const total = Math.min(
    100,
    round(metrics + economicBuyer + decisionCriteria + decisionProcess + identifyPain + champion, 1)
  );

  return {
    calc_type: "meddic_score",
    meddic_total: total,
    deal_confidence: total >= 70 ? "High" : total >= 45 ? "Medium" : "Low",
    breakdown: {
      Metrics: metrics,
      Economic_Buyer: economicBuyer,
      Decision_Criteria: decisionCriteria,
      Decision_Process: decisionProcess,
      Identify_Pain: identifyPain,
      Champion: champion,
    },
    risks: flagged({
      "No economic buyer confirmed": economicBuyer < 10,
      "Weak pain articulation": identifyPain < 8,
      "No internal champion": champion < 8,
      "Unclear decision process": decisionProcess < 8,
    }),
  };
}

const velocityInput = z.object({
  current_month_qualified: int(0),
  previous_month_qualified: int(1),
});

function leadVelocityRate(input: ToolInput): ToolData {
  const { current_month_qualified: current, previous_month_qualified: previous } = velocityInput.parse(input);
  const lvr = previous === 0 ? 100 : round(((current - previous) / previous) * 100, 2);
  const trend = lvr > 0 ? "Growing" : lvr < 0 ? "Declining" : "Flat";
  const advice =
    lvr > 5
      ? "Positive indicator for future revenue growth."
      : lvr < 0
        ? "Investigate top-of-funnel activities."
        : "Maintain current lead generation activities.";

  return {
    calc_type: "lead_velocity_rate",
    lvr_percent: lvr,
    trend,
    current_month: current,
    previous_month: previous,
    delta: current - previous,
    interpretation: `Pipeline is ${trend.toLowerCase()} at ${Math.abs(lvr).toFixed(1)}% MoM. ${advice}`,
  };
}

const conversionInput = z.object({
  stage_win_rates: z.array(z.coerce.number()).default([0.4, 0.6, 0.75, 0.85]),
  days_in_stage: num(10),
  pain_score: int(5),
});

function conversionProbability(input: ToolInput): ToolData {
  const parsed = conversionInput.parse(input);
  const pain = clamp(parsed.pain_score, 0, 10);

  const base = parsed.stage_win_rates.reduce((acc, rate) => acc * clamp(rate, 0, 1), 1);
  // deals older than 30 days in stage lose 0.5% per day, floored at half
  const ageDecay = Math.max(0.5, 1 - Math.max(0, parsed.days_in_stage - 30) * 0.005);
  const painMultiplier = 0.7 + (pain / 10) * 0.3;
  const probability = clamp(round(base * ageDecay * painMultiplier * 100, 1), 1, 99);

  return {
    calc_type: "conversion_probability",
    conversion_probability_pct: probability,
    risk_level: probability >= 65 ? "Low" : probability >= 35 ? "Medium" : "High",
    base_probability_pct: round(base * 100, 1),
    age_decay_factor: round(ageDecay, 3),
    pain_multiplier: round(painMultiplier, 3),
    recommendation:
      probability >= 65
        ? "Strong close candidate. Prepare proposal and procurement docs."
        : probability >= 35
          ? "Mid-funnel risk. Re-engage champion. Validate timeline and budget."
          : "At-risk deal. Executive sponsor outreach or reassign to nurture.",
  };
}

export const leadScoringCalc = defineCalculator("lead_scoring_calc", {
  ilt_score: iltScore,
  bant_qualify: bantQualify,
  meddic_score: meddicScore,
  lead_velocity_rate: leadVelocityRate,
  conversion_probability: conversionProbability,
});
