import type { LLMMessage } from "../llm/client.js";
import type { AgentTeam } from "./agentTeams.js";
import { AGENT_BUILDER_SYSTEM, SALES_MARKETING_SYSTEM, TEAM_BUILDER_SYSTEM } from "./prompts.js";

export interface AgentBuildRequest {
  name: string;
  description: string;
  role: string;
  tools: string[];
  context?: string | null;
}

export interface TeamBuildRequest {
  name: string;
  description: string;
  goal: string;
  mode: "hierarchical" | "flat";
  agentCount: number;
  tools: string[];
}

const AUTO_TOOLS = "auto-select from available tools";

function toolList(tools: string[]): string {
  return tools.length > 0 ? tools.join(", ") : AUTO_TOOLS;
}

function goalContent(goal: string, teamName: string, context?: Record<string, unknown> | null): string {
  const contextBlock =
    context && Object.keys(context).length > 0
      ? `\n\n## Additional Context\n${JSON.stringify(context, null, 2)}`
      : "";
  return (
    `## Team: ${teamName}\n` +
    `## Goal\n${goal}` +
    `${contextBlock}\n\n` +
    `Execute this goal using the ${teamName} team. ` +
    "Follow the team's workflow systematically and provide complete, actionable output."
  );
}

export function buildSwarmRunMessages(
  goal: string,
  teamName: string,
  context?: Record<string, unknown> | null
): LLMMessage[] {
  return [
    { role: "system", content: SALES_MARKETING_SYSTEM },
    { role: "user", content: goalContent(goal, teamName, context) },
  ];
}

/** Same user turn as a swarm run, under the team's own system prompt. */
export function buildAgentTeamMessages(
  team: AgentTeam,
  goal: string,
  context?: Record<string, unknown> | null
): LLMMessage[] {
  return [
    { role: "system", content: team.systemPrompt },
    { role: "user", content: goalContent(goal, team.name, context) },
  ];
}

export function buildAgentBuildMessages(request: AgentBuildRequest): LLMMessage[] {
  return [
    { role: "system", content: AGENT_BUILDER_SYSTEM },
    {
      role: "user",
      content:
        "Build a complete agent configuration for:\n\n" +
        `**Name**: ${request.name}\n` +
        `**Description**: ${request.description}\n` +
        `**Role**: ${request.role}\n` +
        `**Tools**: ${toolList(request.tools)}\n` +
        (request.context ? `**Context**: ${request.context}\n` : "") +
        "\n\nProvide a complete, production-ready agent configuration JSON " +
        "with a detailed system prompt following the sales & marketing workflow format. " +
        "Include a step-by-step workflow (Step 1 to Step N) and an Output Format section.",
    },
  ];
}

export function buildTeamBuildMessages(request: TeamBuildRequest): LLMMessage[] {
  return [
    { role: "system", content: TEAM_BUILDER_SYSTEM },
    {
      role: "user",
      content:
        "Build a complete multi-agent team configuration for:\n\n" +
        `**Team Name**: ${request.name}\n` +
        `**Description**: ${request.description}\n` +
        `**Primary Goal**: ${request.goal}\n` +
        `**Mode**: ${request.mode}\n` +
        `**Agent Count**: ${request.agentCount}\n` +
        `**Available Tools**: ${toolList(request.tools)}\n\n` +
        "Produce:\n" +
        "1. Complete team configuration JSON\n" +
        "2. Agent role descriptions (one paragraph each)\n" +
        "3. Step-by-step workflow\n" +
        "4. Success metrics and KPIs\n" +
        "5. Tool justification",
    },
  ];
}

/** Prepend the swarm system prompt unless the conversation already has a system message. */
export function withDefaultSystemPrompt(messages: LLMMessage[]): LLMMessage[] {
  if (messages.some((m) => m.role === "system")) return [...messages];
  return [{ role: "system", content: SALES_MARKETING_SYSTEM }, ...messages];
}

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]+?\})\s*```/;

/**
 * Parse the first fenced JSON object in a model answer. Returns null when there is none or it
 * does not parse.
 */
export function extractJsonConfig(text: string): Record<string, unknown> | null {
  const match = FENCED_JSON.exec(text);
  if (!match) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(match[1]);
  } catch {
    return null;
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}
