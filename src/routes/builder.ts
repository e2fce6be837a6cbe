import { Router } from "express";
import { z } from "zod";
import type { AppDeps } from "../app.js";
import { buildAgentBuildMessages, buildTeamBuildMessages, extractJsonConfig } from "../swarm/messages.js";
import { requireApiKey } from "./auth.js";
import { abortOnClose, logCompletion, parseWith, secondsSince, sendError } from "./respond.js";

const BUILD_TEMPERATURE = 0.15;

const agentBuildSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  role: z.string(),
  tools: z.array(z.string()).default([]),
  context: z.string().nullish(),
});

const teamBuildSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  goal: z.string(),
  mode: z.enum(["hierarchical", "flat"]).default("hierarchical"),
  agent_count: z.number().int().min(2).max(10).default(4),
  tools: z.array(z.string()).default([]),
});

/** Ask a backend to draft agent and team configurations. */
export function createBuilderRouter({ config, dispatcher }: AppDeps): Router {
  const router = Router();
  const gate = requireApiKey(config.gatewayApiKey);

  router.post("/agent/build", gate, async (req, res) => {
    try {
      const body = parseWith(agentBuildSchema, req.body);
      const messages = buildAgentBuildMessages(body);
      const started = Date.now();
      const result = await dispatcher.dispatch(messages, {
        temperature: BUILD_TEMPERATURE,
        maxTokens: 6144,
        signal: abortOnClose(res).signal,
      });
      const latency = secondsSince(started);
      logCompletion("agent/build", result, latency);
      res.json({
        agent_name: body.name,
        generated_configuration: extractJsonConfig(result.content),
        full_response: result.content,
        backend: result.backend,
        latency_seconds: latency,
      });
    } catch (err) {
      sendError(res, err, "agent/build");
    }
  });

  router.post("/team/build", gate, async (req, res) => {
    try {
      const body = parseWith(teamBuildSchema, req.body);
      const messages = buildTeamBuildMessages({
        name: body.name,
        description: body.description,
        goal: body.goal,
        mode: body.mode,
        agentCount: body.agent_count,
        tools: body.tools,
      });
      const started = Date.now();
      const result = await dispatcher.dispatch(messages, {
        temperature: BUILD_TEMPERATURE,
        maxTokens: 8192,
        signal: abortOnClose(res).signal,
      });
      const latency = secondsSince(started);
      logCompletion("team/build", result, latency);
      res.json({
        team_name: body.name,
        generated_configuration: extractJsonConfig(result.content),
        full_response: result.content,
        backend: result.backend,
        latency_seconds: latency,
      });
    } catch (err) {
      sendError(res, err, "team/build");
    }
  });

  return router;
}
