import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { existsSync } from "fs";
import { createApp } from "./app.js";
import { SERVICE_NAME, loadGatewayConfig } from "./config/gatewayConfig.js";
import { isConfigured } from "./llm/client.js";
import { createDispatcher } from "./llm/dispatch.js";
import { createOpenAIBackendClient } from "./llm/openai.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function findEnvPath(startDir: string): string {
  const candidates = [path.resolve(startDir, "..", ".env"), path.resolve(process.cwd(), ".env")];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  return path.resolve(startDir, "..", ".env");
}

dotenv.config({ path: findEnvPath(__dirname) });
const config = loadGatewayConfig();

const KEY_VARIABLE = { primary: "PRIMARY_LLM_API_KEY", fallback: "FALLBACK_LLM_API_KEY" } as const;
for (const backend of [config.primary, config.fallback]) {
  if (!isConfigured(backend)) {
    console.warn(
      `${KEY_VARIABLE[backend.role]} is not set. ${backend.provider} (${backend.role}) will not be used.`
    );
  }
}
if (config.gatewayApiKey == null) {
  console.warn("GATEWAY_API_KEY is not set. POST endpoints accept requests without X-Api-Key.");
}

const dispatcher = createDispatcher({
  primary: config.primary,
  fallback: config.fallback,
  client: createOpenAIBackendClient({ timeoutMs: config.timeoutMs }),
});

const app = createApp({ config, dispatcher });

app.listen(config.port, () => {
  console.log(`${SERVICE_NAME} at http://localhost:${config.port}`);
});
