import { describe, expect, it } from "vitest";
import { getAgentTeam } from "./agentTeams.js";
import {
  buildAgentBuildMessages,
  buildAgentTeamMessages,
  buildSwarmRunMessages,
  buildTeamBuildMessages,
  extractJsonConfig,
  withDefaultSystemPrompt,
} from "./messages.js";
import { AGENT_BUILDER_SYSTEM, SALES_MARKETING_SYSTEM, TEAM_BUILDER_SYSTEM } from "./prompts.js";

describe("buildSwarmRunMessages", () => {
  it("names the team and goal", () => {
    const [system, user] = buildSwarmRunMessages("Book 20 demos", "lead-generation-engine");

    expect(system).toEqual({ role: "system", content: SALES_MARKETING_SYSTEM });
    expect(user).toEqual({
      role: "user",
      content:
        "## Team: lead-generation-engine\n## Goal\nBook 20 demos\n\n" +
        "Execute this goal using the lead-generation-engine team. " +
        "Follow the team's workflow systematically and provide complete, actionable output.",
    });
  });

  it("appends context as indented JSON", () => {
    const [, user] = buildSwarmRunMessages("Grow MRR", "campaign-analytics-hub", { region: "EMEA" });
    expect(user?.content).toContain('## Goal\nGrow MRR\n\n## Additional Context\n{\n  "region": "EMEA"\n}\n\nExecute');
  });

  it("omits an empty context", () => {
    const [, user] = buildSwarmRunMessages("Grow MRR", "campaign-analytics-hub", {});
    expect(user?.content).not.toContain("Additional Context");
  });
});

describe("buildAgentTeamMessages", () => {
  it("uses the team's system prompt with the swarm run's user turn", () => {
    const team = getAgentTeam("crm-sync");
    if (!team) throw new Error("crm-sync is not registered");
    const messages = buildAgentTeamMessages(team, "Dedupe contacts", { source: "HubSpot" });

    expect(messages[0]).toEqual({ role: "system", content: team.systemPrompt });
    expect(messages[1]).toEqual(buildSwarmRunMessages("Dedupe contacts", "crm-sync", { source: "HubSpot" })[1]);
  });
});

describe("builder messages", () => {
  it("asks for an agent with auto-selected tools when none are given", () => {
    const [system, user] = buildAgentBuildMessages({
      name: "renewal-scout",
      description: "Flags renewals at risk",
      role: "Watches usage and support signals",
      tools: [],
    });

    expect(system?.content).toBe(AGENT_BUILDER_SYSTEM);
    expect(user?.content).toContain(
      "**Name**: renewal-scout\n**Description**: Flags renewals at risk\n" +
        "**Role**: Watches usage and support signals\n**Tools**: auto-select from available tools\n\n\nProvide"
    );
  });

  it("includes the optional agent context and tool list", () => {
    const [, user] = buildAgentBuildMessages({
      name: "renewal-scout",
      description: "d",
      role: "r",
      tools: ["lead_scoring_calc", "roi_calculator"],
      context: "B2B SaaS",
    });
    expect(user?.content).toContain("**Tools**: lead_scoring_calc, roi_calculator\n**Context**: B2B SaaS\n");
  });

  it("describes the requested team shape", () => {
    const [system, user] = buildTeamBuildMessages({
      name: "demand-squad",
      description: "Pipeline generation",
      goal: "Double SQLs",
      mode: "flat",
      agentCount: 3,
      tools: ["seo_analyzer"],
    });

    expect(system?.content).toBe(TEAM_BUILDER_SYSTEM);
    expect(user?.content).toContain("**Mode**: flat\n**Agent Count**: 3\n**Available Tools**: seo_analyzer\n\nProduce:");
  });
});

describe("withDefaultSystemPrompt", () => {
  it("prepends the swarm prompt when there is no system message", () => {
    const result = withDefaultSystemPrompt([{ role: "user", content: "hi" }]);
    expect(result).toEqual([
      { role: "system", content: SALES_MARKETING_SYSTEM },
      { role: "user", content: "hi" },
    ]);
  });

  it("leaves an existing system message alone", () => {
    const input = [
      { role: "user" as const, content: "hi" },
      { role: "system" as const, content: "custom" },
    ];
    expect(withDefaultSystemPrompt(input)).toEqual(input);
  });
});

describe("extractJsonConfig", () => {
  it("parses the first fenced json block", () => {
    const text = 'Here you go:\n```json\n{"name": "a", "tools": ["x"]}\n```\nand\n```json\n{"name": "b"}\n```';
    expect(extractJsonConfig(text)).toEqual({ name: "a", tools: ["x"] });
  });

  it("accepts a fence without a language tag", () => {
    expect(extractJsonConfig('```\n{"mode": "flat"}\n```')).toEqual({ mode: "flat" });
  });

  it("returns null when the block is not valid JSON", () => {
    expect(extractJsonConfig("```json\n{name: a}\n```")).toBeNull();
  });

  it("returns null without a fenced object", () => {
    expect(extractJsonConfig("No config here.")).toBeNull();
    expect(extractJsonConfig("```json\n[1, 2]\n```")).toBeNull();
  });
});
