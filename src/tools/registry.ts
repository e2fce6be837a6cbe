import type { CalculatorTool } from "./base.js";
import { campaignAnalyticsCalc } from "./campaignAnalytics.js";
import { contentOptimizer } from "./contentOptimizer.js";
import { emailCampaignManager } from "./emailCampaign.js";
import { leadScoringCalc } from "./leadScoring.js";
import { marketSegmentation } from "./marketSegmentation.js";
import { roiCalculator } from "./roiCalculator.js";
import { seoAnalyzer } from "./seoAnalyzer.js";

const TOOLS = new Map<string, CalculatorTool>(
  [
    leadScoringCalc,
    campaignAnalyticsCalc,
    contentOptimizer,
    seoAnalyzer,
    emailCampaignManager,
    marketSegmentation,
    roiCalculator,
  ].map((tool) => [tool.name, tool])
);

export function getTool(name: string): CalculatorTool | undefined {
  return TOOLS.get(name);
}

export function listToolNames(): string[] {
  return [...TOOLS.keys()].sort();
}

/** Tools in registration order. */
export function allTools(): CalculatorTool[] {
  return [...TOOLS.values()];
}
