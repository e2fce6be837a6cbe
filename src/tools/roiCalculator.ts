import { z } from "zod";
import { CalculationError, defineCalculator, int, num, round, text } from "./base.js";
import type { ToolData, ToolInput } from "./base.js";

interface RoiBreakdown {
  grossProfit: number;
  netProfit: number;
  roiPct: number;
}

/** Net profit after margin, as a percentage of investment. */
export function computeRoi(investment: number, revenue: number, marginPct = 100): RoiBreakdown {
  const grossProfit = revenue * (marginPct / 100);
  const netProfit = grossProfit - investment;
  return {
    grossProfit: round(grossProfit, 2),
    netProfit: round(netProfit, 2),
    roiPct: round((netProfit / Math.max(0.01, investment)) * 100, 1),
  };
}

const marketingInput = z.object({
  investment: num(0),
  revenue_attributed: num(0),
  gross_margin_pct: num(100),
  time_period_months: int(12),
  attribution_model: text("last_touch"),
});

function marketingRoi(input: ToolInput): ToolData {
  const parsed = marketingInput.parse(input);
  const months = parsed.time_period_months;
  if (months === 0) throw new CalculationError("time_period_months must be non-zero.");
  const { grossProfit, netProfit, roiPct } = computeRoi(
    parsed.investment,
    parsed.revenue_attributed,
    parsed.gross_margin_pct
  );

  let rating: string;
  if (roiPct >= 300) rating = "Excellent";
  else if (roiPct >= 100) rating = "Good";
  else if (roiPct >= 0) rating = "Marginal";
  else rating = "Negative";

  return {
    calc_type: "marketing_roi",
    roi_pct: roiPct,
    monthly_roi_pct: round(roiPct / months, 1),
    net_profit: netProfit,
    gross_profit: grossProfit,
    investment: parsed.investment,
    revenue_attributed: parsed.revenue_attributed,
    time_period_months: months,
    attribution_model: parsed.attribution_model,
    rating,
  };
}

const contentInput = z.object({
  investment: num(0),
  revenue_attributed: num(0),
  content_pieces_produced: int(1),
  gross_margin_pct: num(100),
  time_period_months: int(12),
});

function contentRoi(input: ToolInput): ToolData {
  const parsed = contentInput.parse(input);
  const pieces = Math.max(1, parsed.content_pieces_produced);
  const { netProfit, roiPct } = computeRoi(parsed.investment, parsed.revenue_attributed, parsed.gross_margin_pct);

  return {
    calc_type: "content_roi",
    roi_pct: roiPct,
    net_profit: netProfit,
    cost_per_piece: round(parsed.investment / pieces, 2),
    roi_per_content_piece: round(netProfit / pieces, 2),
    content_pieces: pieces,
    time_period_months: parsed.time_period_months,
    note:
      "Content ROI compounds over time — a blog post published today " +
      "can generate traffic for 2-5 years. Consider 24-month ROI window.",
  };
}

const seoInput = z.object({
  investment: num(0),
  organic_traffic_increase: int(0),
  conversion_rate_pct: num(2),
  average_order_value: num(0),
  gross_margin_pct: num(70),
  time_period_months: int(12),
});

function seoRoi(input: ToolInput): ToolData {
  const parsed = seoInput.parse(input);
  const monthlyRevenue =
    parsed.organic_traffic_increase * (parsed.conversion_rate_pct / 100) * parsed.average_order_value;
  const totalRevenue = monthlyRevenue * parsed.time_period_months;
  const { netProfit, roiPct } = computeRoi(parsed.investment, totalRevenue, parsed.gross_margin_pct);

  return {
    calc_type: "seo_roi",
    roi_pct: roiPct,
    net_profit: netProfit,
    monthly_organic_revenue: round(monthlyRevenue, 2),
    total_attributed_revenue: round(totalRevenue, 2),
    investment: parsed.investment,
    monthly_traffic_increase: parsed.organic_traffic_increase,
    time_period_months: parsed.time_period_months,
    note: "SEO ROI is underestimated — organic traffic has no per-click cost. Consider 3-year NPV.",
  };
}

const paidMediaInput = z.object({
  investment: num(0),
  revenue_attributed: num(0),
  gross_margin_pct: num(70),
});

function paidMediaRoi(input: ToolInput): ToolData {
  const parsed = paidMediaInput.parse(input);
  if (parsed.gross_margin_pct <= 0) {
    throw new CalculationError("gross_margin_pct must be > 0 to calculate breakeven ROAS.");
  }
  const roas = round(parsed.revenue_attributed / Math.max(0.01, parsed.investment), 2);
  const { netProfit, roiPct } = computeRoi(parsed.investment, parsed.revenue_attributed, parsed.gross_margin_pct);
  const breakeven = round(100 / parsed.gross_margin_pct, 2);
  const advice =
    roas > breakeven * 1.5
      ? "Scale budget 20% and monitor CPA."
      : "Optimise creative, audience, and landing page before scaling.";

  return {
    calc_type: "paid_media_roi",
    roi_pct: roiPct,
    roas,
    breakeven_roas: breakeven,
    net_profit: netProfit,
    investment: parsed.investment,
    revenue: parsed.revenue_attributed,
    recommendation:
      `ROAS ${roas}x ${roas > breakeven ? "exceeds" : "is below"} ` + `breakeven of ${breakeven}x. ${advice}`,
  };
}

const influencerInput = z.object({
  investment: num(0),
  revenue_attributed: num(0),
  influencer_reach: int(1),
  gross_margin_pct: num(70),
});

function influencerRoi(input: ToolInput): ToolData {
  const parsed = influencerInput.parse(input);
  const reach = Math.max(1, parsed.influencer_reach);
  const { netProfit, roiPct } = computeRoi(parsed.investment, parsed.revenue_attributed, parsed.gross_margin_pct);

  return {
    calc_type: "influencer_roi",
    roi_pct: roiPct,
    net_profit: netProfit,
    cpm_cost: round((parsed.investment / reach) * 1000, 2),
    influencer_reach: reach,
    investment: parsed.investment,
    revenue_attributed: parsed.revenue_attributed,
    benchmark:
      "Good influencer CPM: $5-$20 for B2C. B2B micro-influencers: $20-$50 CPM but higher conversion intent.",
  };
}

const eventInput = z.object({
  investment: num(0),
  event_attendees: int(1),
  leads_from_event: int(0),
  revenue_attributed: num(0),
  gross_margin_pct: num(70),
});

function eventRoi(input: ToolInput): ToolData {
  const parsed = eventInput.parse(input);
  const attendees = Math.max(1, parsed.event_attendees);
  const { netProfit, roiPct } = computeRoi(parsed.investment, parsed.revenue_attributed, parsed.gross_margin_pct);

  return {
    calc_type: "event_roi",
    roi_pct: roiPct,
    net_profit: netProfit,
    cost_per_attendee: round(parsed.investment / attendees, 2),
    cost_per_lead: round(parsed.investment / Math.max(1, parsed.leads_from_event), 2),
    leads_generated: parsed.leads_from_event,
    attendees,
    investment: parsed.investment,
    revenue_attributed: parsed.revenue_attributed,
    benchmark: "B2B event benchmark: $150-$500 cost per lead. <$200 is excellent for trade shows.",
  };
}

const mixInput = z.object({
  gross_margin_pct: num(70),
  channel_investments: z
    .array(
      z.object({
        channel: text("Unknown"),
        investment: num(0),
        revenue: num(0),
      })
    )
    .default([]),
});

function marketingMixRoi(input: ToolInput): ToolData {
  const parsed = mixInput.parse(input);
  const margin = parsed.gross_margin_pct;
  const channels = parsed.channel_investments;
  if (channels.length === 0) {
    throw new CalculationError(
      "Provide 'channel_investments' array with channel, investment, and revenue for each channel."
    );
  }

  const totalInvestment = channels.reduce((sum, c) => sum + c.investment, 0);
  const totalRevenue = channels.reduce((sum, c) => sum + c.revenue, 0);
  const { netProfit, roiPct } = computeRoi(totalInvestment, totalRevenue, margin);

  const breakdown = channels
    .map((c) => ({
      channel: c.channel,
      investment: c.investment,
      revenue: c.revenue,
      roi_pct: round((((c.revenue * margin) / 100 - c.investment) / Math.max(0.01, c.investment)) * 100, 1),
    }))
    .sort((a, b) => b.roi_pct - a.roi_pct);
  const best = breakdown[0];
  const worst = breakdown[breakdown.length - 1];

  return {
    calc_type: "overall_marketing_mix_roi",
    blended_roi_pct: roiPct,
    total_investment: round(totalInvestment, 2),
    total_revenue: round(totalRevenue, 2),
    net_profit: netProfit,
    channel_breakdown: breakdown,
    top_performing_channel: best.channel,
    worst_performing_channel: worst.channel,
    optimisation_tip:
      breakdown.length >= 2
        ? `Reallocate budget from '${worst.channel}' (ROI: ${worst.roi_pct}%) to ` +
          `'${best.channel}' (ROI: ${best.roi_pct}%) for higher blended returns.`
        : "Add more channels for mix optimisation.",
  };
}

export const roiCalculator = defineCalculator("roi_calculator", {
  marketing_roi: marketingRoi,
  content_roi: contentRoi,
  seo_roi: seoRoi,
  paid_media_roi: paidMediaRoi,
  influencer_roi: influencerRoi,
  event_roi: eventRoi,
  overall_marketing_mix_roi: marketingMixRoi,
});
