import { describe, expect, it } from "vitest";
import {
  DEFAULT_TEAM,
  allTeams,
  getDefaultTeam,
  getTeam,
  listTeams,
  resolveTeamConfig,
  teamNames,
  uniqueAgentCount,
} from "./teams.js";

describe("team registry", () => {
  it("loads the ten teams in file order", () => {
    const teams = allTeams();
    expect(teams).toHaveLength(10);
    expect(teams[0]?.name).toBe("lead-generation-engine");
    expect(teams[9]?.name).toBe("growth-hacker-lab");
  });

  it("lists names alphabetically", () => {
    const names = teamNames();
    expect(names[0]).toBe("abm-orchestrator");
    expect(names[names.length - 1]).toBe("social-media-strategist");
    expect(listTeams().map((t) => t.name)).toEqual(names);
  });

  it("looks teams up by name", () => {
    const team = getTeam("brand-voice-guardian");
    expect(team).toMatchObject({ mode: "flat", category: "brand" });
    expect(team?.agents).toHaveLength(4);
    expect(getTeam("unknown-team")).toBeUndefined();
  });

  it("resolves unknown names to the default team", () => {
    expect(resolveTeamConfig("unknown-team").name).toBe(DEFAULT_TEAM);
    expect(resolveTeamConfig("social-media-strategist").mode).toBe("flat");
    expect(getDefaultTeam().name).toBe("lead-generation-engine");
  });

  it("counts agents shared between teams once", () => {
    const total = allTeams().reduce((sum, t) => sum + t.agents.length, 0);
    expect(total).toBe(58);
    expect(uniqueAgentCount()).toBe(58);
  });
});
