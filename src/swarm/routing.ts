import { readFileSync } from "fs";
import { z } from "zod";
import { getTeam } from "./teams.js";

export interface RoutingRule {
  keywords: readonly string[];
  team: string;
}

const routingFileSchema = z.object({
  defaultTeam: z.string().min(1),
  rules: z.array(z.object({ team: z.string().min(1), keywords: z.array(z.string().min(1)).min(1) })),
});

function loadRouting(): { defaultTeam: string; rules: readonly RoutingRule[] } {
  const raw = readFileSync(new URL("../../data/routing.json", import.meta.url), "utf-8");
  const data = routingFileSchema.parse(JSON.parse(raw));
  for (const name of [data.defaultTeam, ...data.rules.map((r) => r.team)]) {
    if (!getTeam(name)) throw new Error(`routing.json references unknown team: ${name}`);
  }
  return {
    defaultTeam: data.defaultTeam,
    rules: Object.freeze(
      data.rules.map((r) => Object.freeze({ team: r.team, keywords: r.keywords.map((k) => k.toLowerCase()) }))
    ),
  };
}

const ROUTING = loadRouting();

/**
 * Pick a team for a goal: rules are checked in file order and the first rule with any keyword
 * contained in the lower-cased goal wins. Reordering rules changes routing. Keywords of
 * caller-supplied rules must already be lower case.
 */
export function detectTeam(
  goal: string,
  rules: readonly RoutingRule[] = ROUTING.rules,
  defaultTeam: string = ROUTING.defaultTeam
): string {
  const text = goal.toLowerCase();
  for (const rule of rules) {
    if (rule.keywords.some((kw) => text.includes(kw))) return rule.team;
  }
  return defaultTeam;
}

export function routingRules(): readonly RoutingRule[] {
  return ROUTING.rules;
}
