import { describe, expect, it } from "vitest";
import type { ToolResult } from "./base.js";
import { leadScoringCalc } from "./leadScoring.js";

function dataOf(result: ToolResult) {
  if (!result.success) throw new Error(result.error);
  return result.data;
}

describe("lead_scoring_calc", () => {
  it("scores an ideal-size company with a C-level contact as tier A", () => {
    const data = dataOf(
      leadScoringCalc.run({ calc_type: "ilt_score", company_size: 200, title_seniority: "C-Suite", engagement_signals: 0 })
    );

    expect(data).toMatchObject({
      ilt_score: 75,
      tier: "A — Hot",
      recommended_action: "Route to AE immediately. Add to Tier-1 sequence.",
      breakdown: { firmographic_fit_40pts: 40, title_seniority_35pts: 35, engagement_signals_25pts: 0 },
    });
  });

  it("accepts numeric strings", () => {
    const data = dataOf(leadScoringCalc.run({ calc_type: "ilt_score", company_size: "8", title_seniority: "C-Suite" }));
    expect(data).toMatchObject({ breakdown: { firmographic_fit_40pts: 5 } });
  });

  it("qualifies a BANT lead with budget, authority, pain and a near timeline", () => {
    const data = dataOf(
      leadScoringCalc.run({
        calc_type: "bant_qualify",
        budget_range: "$200k-$1M",
        title_seniority: "Director",
        pain_score: 8,
        timeline_months: 2,
      })
    );

    expect(data).toMatchObject({
      bant_total_score: 82.5,
      qualified: true,
      qualification_status: "SQL — Sales Qualified Lead",
      gaps: [],
    });
  });

  it("lists every BANT gap for an unknown lead", () => {
    const data = dataOf(leadScoringCalc.run({ calc_type: "bant_qualify", timeline_months: 24 }));

    expect(data.qualified).toBe(false);
    expect(data.gaps).toEqual([
      "Budget clarity",
      "Economic buyer confirmed",
      "Clear pain identified",
      "Active buying timeline",
    ]);
  });

  it("reports lead velocity month over month", () => {
    const data = dataOf(
      leadScoringCalc.run({ calc_type: "lead_velocity_rate", current_month_qualified: 120, previous_month_qualified: 100 })
    );

    expect(data).toMatchObject({ lvr_percent: 20, trend: "Growing", delta: 20 });
    expect(data.interpretation).toBe("Pipeline is growing at 20.0% MoM. Positive indicator for future revenue growth.");
  });

  it("treats a zero previous month as 100% growth", () => {
    const data = dataOf(
      leadScoringCalc.run({ calc_type: "lead_velocity_rate", current_month_qualified: 5, previous_month_qualified: 0 })
    );
    expect(data.lvr_percent).toBe(100);
  });

  it("combines default stage win rates into a conversion probability", () => {
    const data = dataOf(leadScoringCalc.run({ calc_type: "conversion_probability" }));
    expect(data).toMatchObject({ conversion_probability_pct: 13, risk_level: "High", age_decay_factor: 1 });
  });

  it("weighs a title named like an Object.prototype key as unknown", () => {
    const data = dataOf(
      leadScoringCalc.run({ calc_type: "ilt_score", company_size: 200, title_seniority: "constructor" })
    );
    expect(data).toMatchObject({ ilt_score: 47, tier: "C — Cool", breakdown: { title_seniority_35pts: 7 } });
  });

  it("weighs an unlisted budget like an unknown one", () => {
    const run = (budget_range: string) => leadScoringCalc.run({ calc_type: "bant_qualify", budget_range });
    expect(run("toString")).toEqual(run("Unknown"));
    expect(dataOf(run("toString")).bant_total_score).toBe(16.8);
  });

  it("reads 1 and \"true\" as confirmed MEDDIC flags", () => {
    const loose = dataOf(
      leadScoringCalc.run({ calc_type: "meddic_score", decision_maker_confirmed: 1, champion_identified: "true" })
    );
    const strict = dataOf(
      leadScoringCalc.run({ calc_type: "meddic_score", decision_maker_confirmed: true, champion_identified: true })
    );
    expect(loose).toEqual(strict);
    expect(loose).toMatchObject({ meddic_total: 33, breakdown: { Economic_Buyer: 17, Champion: 16 } });
  });

  it("reads 0 and \"No\" as unconfirmed MEDDIC flags", () => {
    const data = dataOf(
      leadScoringCalc.run({ calc_type: "meddic_score", decision_maker_confirmed: 0, champion_identified: " No " })
    );
    expect(data).toMatchObject({ meddic_total: 7, breakdown: { Economic_Buyer: 4, Champion: 3 } });
  });

  it("rejects a flag it cannot read as a boolean", () => {
    const result = leadScoringCalc.run({ calc_type: "meddic_score", champion_identified: "maybe" });
    expect(result.success).toBe(false);
    expect(result.success ? "" : result.error).toMatch(/^champion_identified: /);
  });

  it("rejects an unknown calc_type with the valid list", () => {
    expect(leadScoringCalc.run({ calc_type: "bogus" })).toEqual({
      success: false,
      toolName: "lead_scoring_calc",
      error:
        "Unknown calc_type 'bogus'. Valid: ilt_score, bant_qualify, meddic_score, lead_velocity_rate, conversion_probability.",
    });
  });

  it("reports invalid input by field instead of throwing", () => {
    const result = leadScoringCalc.run({ calc_type: "ilt_score", company_size: "lots" });
    expect(result.success).toBe(false);
    expect(result.success ? "" : result.error).toMatch(/^company_size: /);
  });
});
