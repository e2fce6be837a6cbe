import type { BackendConfig } from "../llm/client.js";

export const SERVICE_NAME = "Sales & Marketing Swarm Gateway";
export const SERVICE_VERSION = "1.0.0";

export interface GatewayConfig {
  port: number;
  /** Shared secret for mutating endpoints; null disables the gate. */
  gatewayApiKey: string | null;
  timeoutMs: number;
  primary: BackendConfig;
  fallback: BackendConfig;
}

type Env = Record<string, string | undefined>;

const DEFAULTS = {
  port: 8000,
  timeoutMs: 120_000,
  primary: {
    provider: "Ollama Cloud",
    baseURL: "https://ollama.com/v1",
    model: "ministral-3:8b",
  },
  fallback: {
    provider: "NVIDIA NIM",
    baseURL: "https://integrate.api.nvidia.com/v1",
    model: "meta/llama-3.3-70b-instruct",
  },
} as const;

/** Trimmed value of the first variable that is set and non-blank. */
function readString(env: Env, ...names: string[]): string | null {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return null;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw == null) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/**
 * Read gateway settings once at start-up. Missing or invalid values use defaults; a backend
 * without an API key stays unconfigured for the lifetime of the process.
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const primary = Object.freeze<BackendConfig>({
    role: "primary",
    provider: readString(env, "PRIMARY_LLM_PROVIDER") ?? DEFAULTS.primary.provider,
    baseURL: readString(env, "PRIMARY_LLM_BASE_URL") ?? DEFAULTS.primary.baseURL,
    apiKey: readString(env, "PRIMARY_LLM_API_KEY", "OLLAMA_API_KEY"),
    model: readString(env, "PRIMARY_LLM_MODEL") ?? DEFAULTS.primary.model,
  });
  const fallback = Object.freeze<BackendConfig>({
    role: "fallback",
    provider: readString(env, "FALLBACK_LLM_PROVIDER") ?? DEFAULTS.fallback.provider,
    baseURL: readString(env, "FALLBACK_LLM_BASE_URL") ?? DEFAULTS.fallback.baseURL,
    apiKey: readString(env, "FALLBACK_LLM_API_KEY", "NVIDIA_API_KEY"),
    model: readString(env, "FALLBACK_LLM_MODEL") ?? DEFAULTS.fallback.model,
  });

  return Object.freeze<GatewayConfig>({
    port: readPositiveInt(env, "PORT", DEFAULTS.port),
    gatewayApiKey: readString(env, "GATEWAY_API_KEY"),
    timeoutMs: readPositiveInt(env, "LLM_TIMEOUT_MS", DEFAULTS.timeoutMs),
    primary,
    fallback,
  });
}
