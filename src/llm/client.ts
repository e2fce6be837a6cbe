/**
 * Chat-completion backend interface so the dispatcher can be driven by any transport.
 */
export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export type BackendRole = "primary" | "fallback";

export interface BackendConfig {
  role: BackendRole;
  /** Display name of the provider, e.g. "Ollama Cloud". */
  provider: string;
  baseURL: string;
  /** null means the backend is not configured and must never be attempted. */
  apiKey: string | null;
  model: string;
}

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/** One `data: ...` SSE line followed by a blank line. */
export type StreamFrame = string;

export interface BackendClient {
  complete(backend: BackendConfig, messages: LLMMessage[], options: CompletionOptions): Promise<string>;
  /**
   * Resolves once the backend accepted the request. Iterating the result relays frames
   * until the backend closes the stream.
   */
  openStream(
    backend: BackendConfig,
    messages: LLMMessage[],
    options: CompletionOptions
  ): Promise<AsyncIterable<StreamFrame>>;
}

export function isConfigured(backend: BackendConfig): boolean {
  return backend.apiKey != null;
}
