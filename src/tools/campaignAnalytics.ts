import { z } from "zod";
import { CalculationError, defineCalculator, int, num, round } from "./base.js";
import type { ToolData, ToolInput } from "./base.js";

function trendOf(change: number): string {
  return change > 0 ? "Growing" : change < 0 ? "Declining" : "Flat";
}

const cacInput = z.object({
  ad_spend: num(0),
  new_customers: int(1),
  sales_overhead_pct: num(0),
});

function cac(input: ToolInput): ToolData {
  const parsed = cacInput.parse(input);
  const customers = Math.max(1, parsed.new_customers);
  const marketingCac = parsed.ad_spend / customers;
  const fullyLoaded = marketingCac * (1 + parsed.sales_overhead_pct / 100);

  return {
    calc_type: "cac",
    marketing_cac: round(marketingCac, 2),
    fully_loaded_cac: round(fullyLoaded, 2),
    total_spend: parsed.ad_spend,
    new_customers: customers,
    benchmark_note: "Compare to LTV: healthy ratio is LTV:CAC ≥ 3:1.",
    optimisation_tip:
      "Reduce CAC by improving conversion rate at each funnel stage, " +
      "increasing organic channels, and optimising paid media targeting.",
  };
}

const ltvInput = z.object({
  average_order_value: num(0),
  average_purchase_frequency: num(1),
  monthly_churn_rate_pct: num(5),
  gross_margin_pct: num(70),
});

function ltv(input: ToolInput): ToolData {
  const parsed = ltvInput.parse(input);
  const churn = Math.max(0.001, parsed.monthly_churn_rate_pct / 100);
  const margin = parsed.gross_margin_pct / 100;

  const lifespanMonths = 1 / churn;
  const annualRevenue = parsed.average_order_value * parsed.average_purchase_frequency;
  const monthlyRevenue = annualRevenue / 12;

  return {
    calc_type: "ltv",
    ltv_margin_adjusted: round(monthlyRevenue * margin * lifespanMonths, 2),
    ltv_simple: round((annualRevenue * lifespanMonths) / 12, 2),
    avg_customer_lifespan_months: round(lifespanMonths, 1),
    annual_revenue_per_customer: round(annualRevenue, 2),
    inputs: {
      aov: parsed.average_order_value,
      freq_per_year: parsed.average_purchase_frequency,
      monthly_churn_pct: input.monthly_churn_rate_pct ?? null,
      gross_margin_pct: input.gross_margin_pct ?? null,
    },
    note: "Reduce churn by 1% to significantly increase LTV. Focus on onboarding and CS.",
  };
}

const roasInput = z.object({
  ad_spend: num(0),
  revenue_attributed: num(0),
  gross_margin_pct: num(70),
});

function roas(input: ToolInput): ToolData {
  const parsed = roasInput.parse(input);
  const spend = Math.max(0.01, parsed.ad_spend);
  const revenue = parsed.revenue_attributed;
  const margin = parsed.gross_margin_pct / 100;
  if (margin <= 0) throw new CalculationError("gross_margin_pct must be > 0 to calculate breakeven ROAS.");

  const value = round(revenue / spend, 2);
  let rating: string;
  let action: string;
  if (value >= 4) {
    rating = "Excellent";
    action = "Scale this campaign — strong positive ROI.";
  } else if (value >= 2) {
    rating = "Good";
    action = "Performing above break-even. Test scaling budget 20%.";
  } else if (value >= 1) {
    rating = "Break-even";
    action = "Covering spend but not profitable after margin. Optimise creative/targeting.";
  } else {
    rating = "Negative ROI";
    action = "Pause and audit creative, audience, landing page, and offer.";
  }

  return {
    calc_type: "roas",
    roas: value,
    margin_adjusted_roas: round((revenue * margin) / spend, 2),
    revenue,
    spend,
    rating,
    action,
    breakeven_roas: round(1 / margin, 2),
  };
}

const paybackInput = z.object({
  ad_spend: num(0),
  new_customers: int(1),
  average_order_value: num(0),
  average_purchase_frequency: num(12),
  gross_margin_pct: num(70),
});

function paybackPeriod(input: ToolInput): ToolData {
  const parsed = paybackInput.parse(input);
  const cacValue = parsed.ad_spend / Math.max(1, parsed.new_customers);
  const monthlyGrossProfit =
    ((parsed.average_order_value * parsed.average_purchase_frequency) / 12) * (parsed.gross_margin_pct / 100);
  if (monthlyGrossProfit <= 0) {
    throw new CalculationError("Monthly gross profit must be > 0 to calculate payback period.");
  }

  const months = round(cacValue / monthlyGrossProfit, 1);
  return {
    calc_type: "payback_period",
    payback_period_months: months,
    cac: round(cacValue, 2),
    monthly_gross_profit_per_customer: round(monthlyGrossProfit, 2),
    rating: months <= 6 ? "Excellent" : months <= 12 ? "Good" : "Needs improvement",
    benchmark: "SaaS benchmark: <12 months is healthy; <6 months is exceptional.",
  };
}

const mrrInput = z.object({
  current_mrr: num(0),
  previous_mrr: num(0.01),
});

function mrrGrowth(input: ToolInput): ToolData {
  const parsed = mrrInput.parse(input);
  const previous = Math.max(0.01, parsed.previous_mrr);
  const growth = round(((parsed.current_mrr - previous) / previous) * 100, 2);

  return {
    calc_type: "mrr_growth",
    mrr_growth_pct: growth,
    current_mrr: parsed.current_mrr,
    previous_mrr: previous,
    arr_annualised: round(parsed.current_mrr * 12, 2),
    trend: trendOf(growth),
    benchmark: "Healthy SaaS growth: 10-15% MoM in early stage; 5-8% in growth stage.",
  };
}

const churnInput = z.object({
  churned_customers: int(0),
  starting_customers: int(1),
});

function churnRate(input: ToolInput): ToolData {
  const parsed = churnInput.parse(input);
  const starting = Math.max(1, parsed.starting_customers);
  const churnPct = round((parsed.churned_customers / starting) * 100, 2);

  return {
    calc_type: "churn_rate",
    monthly_churn_pct: churnPct,
    monthly_retention_pct: round(100 - churnPct, 2),
    implied_avg_lifespan_months: round(100 / Math.max(churnPct, 0.1), 1),
    churned_customers: parsed.churned_customers,
    starting_customers: starting,
    benchmark: "World-class SaaS: <2% monthly churn. Good: 2-5%. Needs work: >5%.",
    actions:
      churnPct > 3
        ? [
            "Analyse exit surveys to identify top churn reasons.",
            "Implement 30/60/90-day onboarding health checks.",
            "Create proactive CSM playbooks for at-risk accounts.",
          ]
        : ["Maintain retention programmes and monitor NPS trend."],
  };
}

const npsInput = z.object({
  promoters: int(0),
  detractors: int(0),
  total_respondents: int(1),
});

function npsScore(input: ToolInput): ToolData {
  const { promoters, detractors, total_respondents } = npsInput.parse(input);
  const total = Math.max(1, total_respondents);
  const nps = round(((promoters - detractors) / total) * 100, 1);

  let category: string;
  if (nps > 70) category = "World-class (>70)";
  else if (nps > 50) category = "Excellent (50-70)";
  else if (nps > 30) category = "Good (30-50)";
  else category = "Needs improvement (<30)";

  return {
    calc_type: "nps_score",
    nps_score: nps,
    promoters,
    passives: total - promoters - detractors,
    detractors,
    total_respondents: total,
    promoter_pct: round((promoters / total) * 100, 1),
    detractor_pct: round((detractors / total) * 100, 1),
    category,
    benchmark: "B2B SaaS average NPS: 30-40. Top-quartile: >50.",
  };
}

export const campaignAnalyticsCalc = defineCalculator("campaign_analytics_calc", {
  cac,
  ltv,
  roas,
  payback_period: paybackPeriod,
  mrr_growth: mrrGrowth,
  churn_rate: churnRate,
  nps_score: npsScore,
});
