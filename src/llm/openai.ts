import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  type ClientOptions,
} from "openai";
import type { BackendClient, BackendConfig, CompletionOptions, LLMMessage, StreamFrame } from "./client.js";
import { ConfigurationError, GatewayError, ProtocolError, TransportError, errorMessage } from "./errors.js";
import { readLines, relayDataFrames } from "./sse.js";

export const DEFAULT_TIMEOUT_MS = 120_000;

export interface OpenAIBackendClientOptions {
  /** Bounds each outbound attempt. */
  timeoutMs?: number;
  /** Replaces the SDK's fetch (tests answer requests in-process with it). */
  fetch?: ClientOptions["fetch"];
}

function label(backend: BackendConfig): string {
  return `${backend.provider} (${backend.role})`;
}

interface Deadline {
  /** Aborts when the caller aborts or the attempt runs out of time. */
  signal: AbortSignal;
  expired(): boolean;
}

/** One timer per attempt, covering the connection, the headers and the whole body. */
function startDeadline(timeoutMs: number, callerSignal?: AbortSignal): Deadline {
  const timer = AbortSignal.timeout(timeoutMs);
  return {
    signal: callerSignal ? AbortSignal.any([timer, callerSignal]) : timer,
    expired: () => timer.aborted,
  };
}

function toGatewayError(err: unknown, backend: BackendConfig, deadline: Deadline): GatewayError {
  if (err instanceof GatewayError) return err;
  if (deadline.expired() || err instanceof APIConnectionTimeoutError) {
    return new TransportError(`${label(backend)}: request timed out`, { cause: err });
  }
  if (err instanceof APIUserAbortError) {
    return new TransportError(`${label(backend)}: request aborted`, { cause: err });
  }
  if (err instanceof APIConnectionError) {
    return new TransportError(`${label(backend)}: connection failed: ${err.message}`, { cause: err });
  }
  if (err instanceof APIError) {
    const status = err.status ?? null;
    return new ProtocolError(`${label(backend)}: HTTP ${status ?? "error"}: ${err.message}`, status);
  }
  return new ProtocolError(`${label(backend)}: ${errorMessage(err)}`);
}

async function* guardStream(
  frames: AsyncIterable<StreamFrame>,
  backend: BackendConfig,
  deadline: Deadline
): AsyncGenerator<StreamFrame> {
  try {
    for await (const frame of frames) yield frame;
  } catch (err) {
    if (deadline.expired()) throw new TransportError(`${label(backend)}: request timed out`, { cause: err });
    throw new TransportError(`${label(backend)}: stream interrupted: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Backend client for OpenAI-compatible chat-completion APIs. A fresh SDK client is built per
 * call; SDK retries are disabled because failover belongs to the dispatcher.
 */
export function createOpenAIBackendClient(options: OpenAIBackendClientOptions = {}): BackendClient {
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  function connect(backend: BackendConfig): OpenAI {
    if (backend.apiKey == null) {
      throw new ConfigurationError(`${label(backend)}: API key not configured.`);
    }
    return new OpenAI({
      apiKey: backend.apiKey,
      baseURL: backend.baseURL,
      timeout,
      maxRetries: 0,
      fetch: options.fetch,
    });
  }

  function toParams(messages: LLMMessage[]) {
    return messages.map((m) => ({ role: m.role, content: m.content }));
  }

  return {
    async complete(backend: BackendConfig, messages: LLMMessage[], opts: CompletionOptions): Promise<string> {
      const openai = connect(backend);
      const deadline = startDeadline(timeout, opts.signal);
      let response: OpenAI.Chat.Completions.ChatCompletion;
      try {
        response = await openai.chat.completions.create(
          {
            model: backend.model,
            messages: toParams(messages),
            temperature: opts.temperature,
            max_tokens: opts.maxTokens,
            stream: false,
          },
          { signal: deadline.signal }
        );
      } catch (err) {
        throw toGatewayError(err, backend, deadline);
      }
      const first = Array.isArray(response.choices) ? response.choices[0] : undefined;
      const content = first?.message?.content;
      if (content == null) throw new ProtocolError(`${label(backend)}: response has no completion choice`);
      return content;
    },

    async openStream(
      backend: BackendConfig,
      messages: LLMMessage[],
      opts: CompletionOptions
    ): Promise<AsyncIterable<StreamFrame>> {
      const openai = connect(backend);
      const deadline = startDeadline(timeout, opts.signal);
      let response: Response;
      try {
        response = await openai.chat.completions
          .create(
            {
              model: backend.model,
              messages: toParams(messages),
              temperature: opts.temperature,
              max_tokens: opts.maxTokens,
              stream: true,
            },
            { signal: deadline.signal }
          )
          .asResponse();
      } catch (err) {
        throw toGatewayError(err, backend, deadline);
      }
      if (!response.body) throw new ProtocolError(`${label(backend)}: streaming response has no body`);
      return guardStream(relayDataFrames(readLines(response.body)), backend, deadline);
    },
  };
}
