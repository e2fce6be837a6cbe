import { Router } from "express";
import { z } from "zod";
import type { AppDeps } from "../app.js";
import { isConfigured } from "../llm/client.js";
import { withDefaultSystemPrompt } from "../swarm/messages.js";
import { requireApiKey } from "./auth.js";
import { abortOnClose, logCompletion, parseWith, relayFrames, secondsSince, sendError } from "./respond.js";

const chatSchema = z.object({
  // accepted for client compatibility; the backend decides the model
  model: z.string().optional(),
  messages: z.array(z.object({ role: z.enum(["system", "user", "assistant"]), content: z.string() })),
  temperature: z.number().min(0).max(2).default(0.1),
  max_tokens: z.number().int().positive().default(4096),
  stream: z.boolean().default(false),
});

function ownerSlug(provider: string): string {
  return provider.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");
}

/** Drop-in subset of the OpenAI chat API, served by whichever backend answers. */
export function createOpenAICompatRouter({ config, dispatcher }: AppDeps): Router {
  const router = Router();

  router.post("/chat/completions", requireApiKey(config.gatewayApiKey), async (req, res) => {
    try {
      const body = parseWith(chatSchema, req.body);
      const messages = withDefaultSystemPrompt(body.messages);
      const controller = abortOnClose(res);
      const options = { temperature: body.temperature, maxTokens: body.max_tokens, signal: controller.signal };

      if (body.stream) {
        await relayFrames(res, dispatcher.stream(messages, options), "chat/completions");
        return;
      }

      const started = Date.now();
      const result = await dispatcher.dispatch(messages, options);
      logCompletion("chat/completions", result, secondsSince(started));
      const created = Math.floor(Date.now() / 1000);
      res.json({
        id: `chatcmpl-gw-${created}`,
        object: "chat.completion",
        created,
        model: result.model,
        choices: [
          {
            index: 0,
            message: { role: "assistant", content: result.content },
            finish_reason: "stop",
          },
        ],
        usage: { prompt_tokens: -1, completion_tokens: -1, total_tokens: -1 },
        backend: result.backend,
      });
    } catch (err) {
      sendError(res, err, "chat/completions");
    }
  });

  router.get("/models", (_req, res) => {
    const data = dispatcher
      .backends()
      .filter(isConfigured)
      .map((b) => ({ id: b.model, object: "model", created: 0, owned_by: ownerSlug(b.provider), role: b.role }));
    res.json({ object: "list", data });
  });

  return router;
}
