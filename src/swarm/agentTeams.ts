import { readFileSync } from "fs";
import { z } from "zod";
import type { TeamFields } from "./teams.js";
import { allTeams, teamFieldsSchema } from "./teams.js";

/** A team that can be run by name with its own system prompt and sampling settings. */
export interface AgentTeam extends TeamFields {
  systemPrompt: string;
}

const automationTeamsFileSchema = z.object({ teams: z.array(teamFieldsSchema) });

function readPrompt(name: string): string {
  return readFileSync(new URL(`../../data/team-prompts/${name}.md`, import.meta.url), "utf-8").trim();
}

function withPrompt(fields: TeamFields): AgentTeam {
  return {
    name: fields.name,
    description: fields.description,
    mode: fields.mode,
    agents: fields.agents,
    tools: fields.tools,
    injectKnowledge: fields.injectKnowledge,
    injectHistory: fields.injectHistory,
    temperature: fields.temperature,
    maxTokens: fields.maxTokens,
    metadata: fields.metadata,
    systemPrompt: readPrompt(fields.name),
  };
}

const REGISTRY = new Map<string, AgentTeam>();

/** Adds a team, replacing any registered under the same name. */
export function registerTeam(team: AgentTeam): void {
  REGISTRY.set(team.name, Object.freeze({ ...team }));
}

export function getAgentTeam(name: string): AgentTeam | undefined {
  return REGISTRY.get(name);
}

/** Registered team names, sorted. */
export function listAgentTeams(): string[] {
  return [...REGISTRY.keys()].sort();
}

/** Registered teams in registration order. */
export function allAgentTeams(): AgentTeam[] {
  return [...REGISTRY.values()];
}

/** Wire shape, without the system prompt. */
export function agentTeamToJson(team: AgentTeam) {
  return {
    name: team.name,
    description: team.description,
    mode: team.mode,
    agents: team.agents,
    tools: team.tools,
    inject_knowledge: team.injectKnowledge,
    inject_history: team.injectHistory,
    temperature: team.temperature,
    max_tokens: team.maxTokens,
    metadata: team.metadata,
  };
}

function registerBuiltIns(): void {
  const raw = readFileSync(new URL("../../data/automation-teams.json", import.meta.url), "utf-8");
  const { teams } = automationTeamsFileSchema.parse(JSON.parse(raw));
  for (const fields of teams) registerTeam(withPrompt(fields));
  for (const team of allTeams()) registerTeam(withPrompt(team));
}

registerBuiltIns();
