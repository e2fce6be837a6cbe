import { Router } from "express";
import { z } from "zod";
import type { AppDeps } from "../app.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../config/gatewayConfig.js";
import type { BackendConfig } from "../llm/client.js";
import { isConfigured } from "../llm/client.js";
import { NotFoundError } from "../llm/errors.js";
import { agentTeamToJson, allAgentTeams, getAgentTeam, listAgentTeams } from "../swarm/agentTeams.js";
import { buildAgentTeamMessages, buildSwarmRunMessages } from "../swarm/messages.js";
import { detectTeam } from "../swarm/routing.js";
import type { TeamConfig } from "../swarm/teams.js";
import { allTeams, getTeam, listTeams, resolveTeamConfig, teamNames, uniqueAgentCount } from "../swarm/teams.js";
import { requireApiKey } from "./auth.js";
import { abortOnClose, logCompletion, parseWith, relayFrames, secondsSince, sendError } from "./respond.js";

const RUN_TEMPERATURE = 0.1;
const RUN_MAX_TOKENS = 8192;

const CAPABILITIES = [
  "lead_generation_and_qualification",
  "content_marketing_and_seo",
  "email_campaign_management",
  "social_media_strategy",
  "campaign_analytics",
  "competitive_intelligence",
  "sales_enablement",
  "account_based_marketing",
  "brand_strategy",
  "growth_hacking",
];

const runSchema = z.object({
  goal: z.string().min(1, "goal must not be empty"),
  team: z.string().nullish(),
  context: z.record(z.unknown()).nullish(),
  stream: z.boolean().default(false),
});

const agentTeamRunSchema = runSchema.omit({ team: true });

function teamSummary(team: TeamConfig) {
  return {
    name: team.name,
    description: team.description,
    mode: team.mode,
    agent_count: team.agents.length,
    category: team.category,
    tools: team.tools,
    use_cases: team.useCases,
    kpis: team.kpis,
  };
}

export function createSwarmRouter({ config, dispatcher }: AppDeps): Router {
  const router = Router();

  /** Run a goal through one team: override by name, otherwise keyword routing. */
  router.post("/run", requireApiKey(config.gatewayApiKey), async (req, res) => {
    try {
      const body = parseWith(runSchema, req.body);
      const teamName = body.team || detectTeam(body.goal);
      const team = resolveTeamConfig(teamName);
      const messages = buildSwarmRunMessages(body.goal, teamName, body.context);
      const controller = abortOnClose(res);
      const options = { temperature: RUN_TEMPERATURE, maxTokens: RUN_MAX_TOKENS, signal: controller.signal };

      if (body.stream) {
        await relayFrames(res, dispatcher.stream(messages, options), "swarm/run");
        return;
      }

      const started = Date.now();
      const result = await dispatcher.dispatch(messages, options);
      const latency = secondsSince(started);
      logCompletion("swarm/run", result, latency);
      res.json({
        goal: body.goal,
        team: teamName,
        team_config: {
          description: team.description,
          mode: team.mode,
          agents: team.agents,
          category: team.category,
        },
        result: result.content,
        backend: result.backend,
        latency_seconds: latency,
      });
    } catch (err) {
      sendError(res, err, "swarm/run");
    }
  });

  router.get("/health", (_req, res) => {
    const [primary, fallback] = dispatcher.backends();
    const describe = (b: BackendConfig) => ({ provider: b.provider, model: b.model, configured: isConfigured(b) });
    res.json({
      status: "operational",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      backends: { primary: describe(primary), fallback: describe(fallback) },
      teams_available: allTeams().length,
      team_names: teamNames(),
      capabilities: CAPABILITIES,
    });
  });

  router.get("/topology", (_req, res) => {
    const teams = allTeams();
    res.json({
      swarm_name: SERVICE_NAME,
      total_teams: teams.length,
      total_unique_agents: uniqueAgentCount(),
      coordination_model: "hierarchical + flat hybrid",
      teams: Object.fromEntries(
        teams.map((t) => [
          t.name,
          {
            description: t.description,
            mode: t.mode,
            agent_count: t.agents.length,
            agents: t.agents,
            tools: t.tools,
            category: t.category,
            kpis: t.kpis,
          },
        ])
      ),
      routing_logic: "keyword-based auto-detection with manual override via 'team' parameter",
    });
  });

  router.get("/teams", (_req, res) => {
    const teams = listTeams().map(teamSummary);
    res.json({
      total: teams.length,
      teams,
      routing_hint:
        "Use POST /swarm/run with a 'goal' to auto-detect the best team, " +
        "or pass a 'team' name from this list to override.",
    });
  });

  router.get("/teams/:teamName", (req, res) => {
    const name = req.params.teamName;
    const team = getTeam(name);
    if (!team) {
      sendError(
        res,
        new NotFoundError(`Team '${name}' not found. Available teams: ${teamNames().join(", ")}`),
        "swarm/teams"
      );
      return;
    }
    const { agent_count, ...summary } = teamSummary(team);
    res.json({
      ...summary,
      agents: team.agents,
      agent_count,
      temperature: team.temperature,
      max_tokens: team.maxTokens,
      inject_knowledge: team.injectKnowledge,
      inject_history: team.injectHistory,
      metadata: team.metadata,
      how_to_invoke: {
        auto: `POST /swarm/run with a goal describing ${team.description.toLowerCase()}`,
        explicit: `POST /swarm/run with team='${name}' and your goal`,
      },
    });
  });

  router.get("/agent-teams", (_req, res) => {
    const teams = allAgentTeams().map(agentTeamToJson);
    res.json({ total: teams.length, team_names: listAgentTeams(), teams });
  });

  router.get("/agent-teams/:name", (req, res) => {
    const name = req.params.name;
    const team = getAgentTeam(name);
    if (!team) {
      sendError(res, agentTeamNotFound(name), "swarm/agent-teams");
      return;
    }
    res.json({ ...agentTeamToJson(team), system_prompt: team.systemPrompt });
  });

  /** Run a goal under one team's own system prompt, temperature and token budget. */
  router.post("/agent-teams/:name/run", requireApiKey(config.gatewayApiKey), async (req, res) => {
    const route = "swarm/agent-teams/run";
    try {
      const name = req.params.name;
      const team = getAgentTeam(name);
      if (!team) throw agentTeamNotFound(name);
      const body = parseWith(agentTeamRunSchema, req.body);
      const messages = buildAgentTeamMessages(team, body.goal, body.context);
      const controller = abortOnClose(res);
      const options = { temperature: team.temperature, maxTokens: team.maxTokens, signal: controller.signal };

      if (body.stream) {
        await relayFrames(res, dispatcher.stream(messages, options), route);
        return;
      }

      const started = Date.now();
      const result = await dispatcher.dispatch(messages, options);
      const latency = secondsSince(started);
      logCompletion(route, result, latency);
      res.json({
        goal: body.goal,
        team: team.name,
        result: result.content,
        backend: result.backend,
        model: result.model,
        latency_seconds: latency,
      });
    } catch (err) {
      sendError(res, err, route);
    }
  });

  return router;
}

function agentTeamNotFound(name: string): NotFoundError {
  return new NotFoundError(`Agent team '${name}' not found. Available: ${listAgentTeams().join(", ")}`);
}
