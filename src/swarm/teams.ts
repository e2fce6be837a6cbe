import { readFileSync } from "fs";
import { z } from "zod";

export const DEFAULT_TEAM = "lead-generation-engine";

/** Fields every team carries, whether it is routed to or run by name. */
export const teamFieldsSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  mode: z.enum(["hierarchical", "flat"]),
  agents: z.array(z.string()).min(1),
  tools: z.array(z.string()),
  injectKnowledge: z.boolean().default(true),
  injectHistory: z.boolean().default(false),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().positive().default(4096),
  metadata: z.record(z.unknown()).default({}),
});

export type TeamFields = z.infer<typeof teamFieldsSchema>;

const teamSchema = teamFieldsSchema.extend({
  useCases: z.array(z.string()),
  kpis: z.array(z.string()),
  category: z.string(),
});

export type TeamConfig = z.infer<typeof teamSchema>;

const teamsFileSchema = z.object({ teams: z.array(teamSchema) });

function loadTeams(): Map<string, TeamConfig> {
  const raw = readFileSync(new URL("../../data/teams.json", import.meta.url), "utf-8");
  const { teams } = teamsFileSchema.parse(JSON.parse(raw));
  const registry = new Map<string, TeamConfig>();
  for (const team of teams) {
    if (registry.has(team.name)) throw new Error(`Duplicate team in teams.json: ${team.name}`);
    registry.set(team.name, Object.freeze(team));
  }
  if (!registry.has(DEFAULT_TEAM)) throw new Error(`teams.json is missing the default team ${DEFAULT_TEAM}`);
  return registry;
}

/** Loaded once at module load, read-only afterwards. */
const TEAMS = loadTeams();

export function getTeam(name: string): TeamConfig | undefined {
  return TEAMS.get(name);
}

/** The named team, or the default team's config when the name is unknown. */
export function resolveTeamConfig(name: string): TeamConfig {
  return TEAMS.get(name) ?? getDefaultTeam();
}

export function getDefaultTeam(): TeamConfig {
  const team = TEAMS.get(DEFAULT_TEAM);
  if (!team) throw new Error(`Default team ${DEFAULT_TEAM} not registered`);
  return team;
}

export function teamNames(): string[] {
  return [...TEAMS.keys()].sort();
}

/** All teams in file order. */
export function allTeams(): TeamConfig[] {
  return [...TEAMS.values()];
}

/** All teams sorted by name, in the same order as teamNames(). */
export function listTeams(): TeamConfig[] {
  return allTeams().sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export function uniqueAgentCount(): number {
  return new Set(allTeams().flatMap((t) => t.agents)).size;
}
