import { describe, expect, it } from "vitest";
import type { ToolResult } from "./base.js";
import { campaignAnalyticsCalc } from "./campaignAnalytics.js";

function dataOf(result: ToolResult) {
  if (!result.success) throw new Error(result.error);
  return result.data;
}

describe("campaign_analytics_calc", () => {
  it("loads sales overhead onto CAC", () => {
    const data = dataOf(
      campaignAnalyticsCalc.run({ calc_type: "cac", ad_spend: 10000, new_customers: 40, sales_overhead_pct: 50 })
    );
    expect(data).toMatchObject({ marketing_cac: 250, fully_loaded_cac: 375, total_spend: 10000, new_customers: 40 });
  });

  it("rates ROAS and derives the breakeven from margin", () => {
    const data = dataOf(
      campaignAnalyticsCalc.run({ calc_type: "roas", ad_spend: 1000, revenue_attributed: 5000, gross_margin_pct: 50 })
    );
    expect(data).toMatchObject({
      roas: 5,
      margin_adjusted_roas: 2.5,
      breakeven_roas: 2,
      rating: "Excellent",
      action: "Scale this campaign — strong positive ROI.",
    });
  });

  it("refuses ROAS without a positive margin", () => {
    const result = campaignAnalyticsCalc.run({ calc_type: "roas", ad_spend: 1000, gross_margin_pct: 0 });
    expect(result).toEqual({
      success: false,
      toolName: "campaign_analytics_calc",
      error: "gross_margin_pct must be > 0 to calculate breakeven ROAS.",
    });
  });

  it("refuses a payback period without gross profit", () => {
    const result = campaignAnalyticsCalc.run({ calc_type: "payback_period", ad_spend: 1000 });
    expect(result.success ? "" : result.error).toBe("Monthly gross profit must be > 0 to calculate payback period.");
  });

  it("computes payback months from CAC and monthly profit", () => {
    const data = dataOf(
      campaignAnalyticsCalc.run({
        calc_type: "payback_period",
        ad_spend: 12000,
        new_customers: 10,
        average_order_value: 100,
        average_purchase_frequency: 12,
        gross_margin_pct: 50,
      })
    );
    // CAC 1200 against 50/month gross profit
    expect(data).toMatchObject({ payback_period_months: 24, cac: 1200, rating: "Needs improvement" });
  });

  it("annualises MRR growth", () => {
    const data = dataOf(campaignAnalyticsCalc.run({ calc_type: "mrr_growth", current_mrr: 11000, previous_mrr: 10000 }));
    expect(data).toMatchObject({ mrr_growth_pct: 10, arr_annualised: 132000, trend: "Growing" });
  });

  it("suggests retention work above 3% churn", () => {
    const data = dataOf(campaignAnalyticsCalc.run({ calc_type: "churn_rate", churned_customers: 5, starting_customers: 100 }));
    expect(data).toMatchObject({ monthly_churn_pct: 5, monthly_retention_pct: 95, implied_avg_lifespan_months: 20 });
    expect(data.actions).toHaveLength(3);
  });

  it("categorises NPS and counts passives", () => {
    const data = dataOf(
      campaignAnalyticsCalc.run({ calc_type: "nps_score", promoters: 60, detractors: 10, total_respondents: 100 })
    );
    expect(data).toMatchObject({ nps_score: 50, passives: 30, category: "Good (30-50)", promoter_pct: 60 });
  });
});
