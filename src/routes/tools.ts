import { Router } from "express";
import { z } from "zod";
import type { AppDeps } from "../app.js";
import { NotFoundError } from "../llm/errors.js";
import type { CalculatorTool } from "../tools/base.js";
import { toAnthropicSchema, toOpenAISchema } from "../tools/base.js";
import { getTool, listToolNames } from "../tools/registry.js";
import { requireApiKey } from "./auth.js";
import { parseWith, sendError } from "./respond.js";

const schemaQuery = z.object({
  format: z.enum(["openai", "anthropic"]).default("openai"),
});

const runBody = z.record(z.unknown());

function findTool(name: string): CalculatorTool {
  const tool = getTool(name);
  if (!tool) {
    throw new NotFoundError(`Tool '${name}' not found. Available tools: ${listToolNames().join(", ")}`);
  }
  return tool;
}

export function createToolsRouter({ config }: AppDeps): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    const tools = listToolNames().map(findTool);
    res.json({
      total: tools.length,
      tools: tools.map((t) => ({ name: t.name, description: t.description, calc_types: t.calcTypes })),
    });
  });

  router.get("/:name/schema", (req, res) => {
    try {
      const tool = findTool(req.params.name);
      const { format } = parseWith(schemaQuery, req.query);
      res.json(format === "anthropic" ? toAnthropicSchema(tool) : toOpenAISchema(tool));
    } catch (err) {
      sendError(res, err, "tools/schema");
    }
  });

  router.post("/:name/run", requireApiKey(config.gatewayApiKey), (req, res) => {
    try {
      const tool = findTool(req.params.name);
      const input = parseWith(runBody, req.body);
      const result = tool.run(input);
      if (result.success) res.json({ ok: true, tool: result.toolName, data: result.data });
      else res.status(400).json({ ok: false, tool: result.toolName, error: result.error });
    } catch (err) {
      sendError(res, err, "tools/run");
    }
  });

  return router;
}
