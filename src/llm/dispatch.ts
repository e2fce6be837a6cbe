import type {
  BackendClient,
  BackendConfig,
  BackendRole,
  CompletionOptions,
  LLMMessage,
  StreamFrame,
} from "./client.js";
import { isConfigured } from "./client.js";
import { ServiceUnavailableError } from "./errors.js";
import { errorFrame } from "./sse.js";

export const NO_BACKEND_MESSAGE =
  "No LLM backend available. Configure PRIMARY_LLM_API_KEY or FALLBACK_LLM_API_KEY.";
export const NO_BACKEND_STREAM_MESSAGE = "No LLM backend available.";

export interface CallResult {
  content: string;
  backend: BackendRole;
  model: string;
}

export type Attempt<T> = { ok: true; value: T } | { ok: false; error: unknown };

export async function attempt<T>(run: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await run() };
  } catch (error) {
    return { ok: false, error };
  }
}

export interface DispatcherDeps {
  primary: BackendConfig;
  fallback: BackendConfig;
  client: BackendClient;
}

export interface Dispatcher {
  dispatch(messages: LLMMessage[], options: CompletionOptions): Promise<CallResult>;
  stream(messages: LLMMessage[], options: CompletionOptions): AsyncGenerator<StreamFrame>;
  backends(): readonly BackendConfig[];
}

/**
 * Primary → fallback selection. The primary's failure is discarded; the fallback gets a single
 * attempt and its failure reaches the caller. Nothing is remembered between calls.
 */
export function createDispatcher({ primary, fallback, client }: DispatcherDeps): Dispatcher {
  return {
    async dispatch(messages: LLMMessage[], options: CompletionOptions): Promise<CallResult> {
      if (isConfigured(primary)) {
        const result = await attempt(() => client.complete(primary, messages, options));
        if (result.ok) return { content: result.value, backend: "primary", model: primary.model };
        // caller went away; nobody is left to receive a fallback answer
        if (options.signal?.aborted) throw result.error;
      }

      if (isConfigured(fallback)) {
        const content = await client.complete(fallback, messages, options);
        return { content, backend: "fallback", model: fallback.model };
      }

      throw new ServiceUnavailableError(NO_BACKEND_MESSAGE);
    },

    async *stream(messages: LLMMessage[], options: CompletionOptions): AsyncGenerator<StreamFrame> {
      if (isConfigured(primary)) {
        // only opening the stream is covered; a failure after the first frame is not retried
        const opened = await attempt(() => client.openStream(primary, messages, options));
        if (opened.ok) {
          yield* opened.value;
          return;
        }
        if (options.signal?.aborted) throw opened.error;
      }

      if (isConfigured(fallback)) {
        const frames = await client.openStream(fallback, messages, options);
        yield* frames;
        return;
      }

      yield errorFrame(NO_BACKEND_STREAM_MESSAGE);
    },

    backends(): readonly BackendConfig[] {
      return [primary, fallback];
    },
  };
}
