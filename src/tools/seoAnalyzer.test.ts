import { describe, expect, it } from "vitest";
import type { ToolResult } from "./base.js";
import { seoAnalyzer } from "./seoAnalyzer.js";

function dataOf(result: ToolResult) {
  if (!result.success) throw new Error(result.error);
  return result.data;
}

describe("seo_analyzer", () => {
  it("estimates traffic at each ranking position", () => {
    const data = dataOf(seoAnalyzer.run({ calc_type: "traffic_potential", search_volume: 10000 }));

    expect(data.estimated_traffic_at_input_ctr).toBe(500);
    expect(data.traffic_by_ranking_position).toMatchObject({ 1: 2850, 5: 720, 10: 250 });
    expect(data.recommendation).toBe(
      "Ranking #1 would yield ~2,850 monthly visitors. Even position #5 delivers ~720 visits."
    );
  });

  it("caps keyword difficulty at 100", () => {
    const data = dataOf(
      seoAnalyzer.run({ calc_type: "keyword_difficulty", keyword: "crm", competition_score: 1, search_volume: 1_000_000 })
    );
    expect(data).toMatchObject({ keyword_difficulty_score: 100, difficulty_label: "Hard", keyword: "crm" });
  });

  it("calls an uncontested keyword easy", () => {
    const data = dataOf(seoAnalyzer.run({ calc_type: "keyword_difficulty", competition_score: 0 }));
    expect(data).toMatchObject({ keyword_difficulty_score: 0, difficulty_label: "Easy" });
  });

  it("tracks backlink velocity", () => {
    const data = dataOf(
      seoAnalyzer.run({ calc_type: "backlink_velocity", new_backlinks_this_month: 30, new_backlinks_last_month: 20 })
    );
    expect(data).toMatchObject({ velocity_pct_mom: 50, trend: "Accelerating" });
  });

  it("clamps rank probability at 95%", () => {
    const data = dataOf(
      seoAnalyzer.run({ calc_type: "rank_probability", current_da: 60, top_ranking_da_avg: 60, content_quality_score: 100 })
    );
    expect(data).toMatchObject({
      page1_rank_probability_pct: 95,
      recommendation: "Strong chance to rank. Publish and promote actively.",
    });
  });

  it("gives a brand-new domain low authority", () => {
    const data = dataOf(seoAnalyzer.run({ calc_type: "domain_authority_estimate", domain_age_years: 0 }));
    expect(data).toMatchObject({ estimated_da: 0, tier: "Low authority (DA <30)" });
  });
});
