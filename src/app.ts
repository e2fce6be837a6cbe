import express from "express";
import type { ErrorRequestHandler, Express } from "express";
import cors from "cors";
import type { GatewayConfig } from "./config/gatewayConfig.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./config/gatewayConfig.js";
import { isConfigured } from "./llm/client.js";
import type { Dispatcher } from "./llm/dispatch.js";
import { ValidationError, errorMessage } from "./llm/errors.js";
import { createBuilderRouter } from "./routes/builder.js";
import { createOpenAICompatRouter } from "./routes/openaiCompat.js";
import { sendError } from "./routes/respond.js";
import { createSwarmRouter } from "./routes/swarm.js";
import { createToolsRouter } from "./routes/tools.js";

export interface AppDeps {
  config: GatewayConfig;
  dispatcher: Dispatcher;
}

/** express.json() rejects unparseable bodies with a SyntaxError carrying the raw body. */
function isBodyParseError(err: unknown): err is SyntaxError {
  return err instanceof SyntaxError && "body" in err;
}

const handleError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (isBodyParseError(err)) {
    sendError(res, new ValidationError(`Invalid JSON body: ${errorMessage(err)}`), "app");
    return;
  }
  sendError(res, err, "app");
};

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    const [primary, fallback] = deps.dispatcher.backends();
    res.json({
      status: "healthy",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      backends: {
        primary: isConfigured(primary) ? "configured" : "not configured",
        fallback: isConfigured(fallback) ? "configured" : "not configured",
      },
      timestamp: Date.now() / 1000,
    });
  });

  app.use("/swarm", createSwarmRouter(deps));
  app.use("/v1", createOpenAICompatRouter(deps));
  app.use("/tools", createToolsRouter(deps));
  app.use(createBuilderRouter(deps));

  app.use(handleError);
  return app;
}
