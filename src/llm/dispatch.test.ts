import { describe, expect, it, vi } from "vitest";
import type { BackendClient, BackendConfig, LLMMessage, StreamFrame } from "./client.js";
import { NO_BACKEND_MESSAGE, attempt, createDispatcher } from "./dispatch.js";
import { ProtocolError, ServiceUnavailableError, TransportError } from "./errors.js";

const primary: BackendConfig = {
  role: "primary",
  provider: "Primary Test",
  baseURL: "http://primary.test/v1",
  apiKey: "test-primary-key",
  model: "primary-model",
};

const fallback: BackendConfig = {
  role: "fallback",
  provider: "Fallback Test",
  baseURL: "http://fallback.test/v1",
  apiKey: "test-fallback-key",
  model: "fallback-model",
};

const unset = (backend: BackendConfig): BackendConfig => ({ ...backend, apiKey: null });

const messages: LLMMessage[] = [{ role: "user", content: "Score this lead" }];
const options = { temperature: 0.1, maxTokens: 64 };

async function* frames(list: string[], failWith?: Error): AsyncGenerator<StreamFrame> {
  for (const frame of list) yield frame;
  if (failWith) throw failWith;
}

function fakeClient() {
  const complete = vi.fn<BackendClient["complete"]>();
  const openStream = vi.fn<BackendClient["openStream"]>();
  const client: BackendClient = { complete, openStream };
  return { client, complete, openStream };
}

function rolesOf(calls: ReadonlyArray<readonly [BackendConfig, ...unknown[]]>): string[] {
  return calls.map(([backend]) => backend.role);
}

async function collect(stream: AsyncIterable<StreamFrame>): Promise<string[]> {
  const out: string[] = [];
  for await (const frame of stream) out.push(frame);
  return out;
}

describe("attempt", () => {
  it("wraps a resolved value", async () => {
    await expect(attempt(async () => 7)).resolves.toEqual({ ok: true, value: 7 });
  });

  it("captures a rejection instead of throwing", async () => {
    const error = new Error("nope");
    await expect(attempt(async () => Promise.reject(error))).resolves.toEqual({ ok: false, error });
  });
});

describe("dispatch", () => {
  it("returns the primary answer and never touches the fallback", async () => {
    const fake = fakeClient();
    fake.complete.mockResolvedValue("primary answer");
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    const result = await dispatcher.dispatch(messages, options);

    expect(result).toEqual({ content: "primary answer", backend: "primary", model: "primary-model" });
    expect(rolesOf(fake.complete.mock.calls)).toEqual(["primary"]);
  });

  it("passes messages and options through unchanged", async () => {
    const fake = fakeClient();
    fake.complete.mockResolvedValue("ok");
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    await dispatcher.dispatch(messages, options);

    expect(fake.complete).toHaveBeenCalledWith(primary, messages, options);
  });

  it("falls back when the primary fails", async () => {
    const fake = fakeClient();
    fake.complete.mockImplementation(async (backend) => {
      if (backend.role === "primary") throw new TransportError("primary down");
      return "fallback answer";
    });
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    const result = await dispatcher.dispatch(messages, options);

    expect(result).toEqual({ content: "fallback answer", backend: "fallback", model: "fallback-model" });
    expect(rolesOf(fake.complete.mock.calls)).toEqual(["primary", "fallback"]);
  });

  it("surfaces the fallback's error when both backends fail", async () => {
    const fake = fakeClient();
    fake.complete.mockImplementation(async (backend) => {
      if (backend.role === "primary") throw new TransportError("primary down");
      throw new ProtocolError("fallback said 500", 500);
    });
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    await expect(dispatcher.dispatch(messages, options)).rejects.toThrow("fallback said 500");
    expect(rolesOf(fake.complete.mock.calls)).toEqual(["primary", "fallback"]);
  });

  it("goes straight to the fallback when the primary has no key", async () => {
    const fake = fakeClient();
    fake.complete.mockResolvedValue("fallback answer");
    const dispatcher = createDispatcher({ primary: unset(primary), fallback, client: fake.client });

    const result = await dispatcher.dispatch(messages, options);

    expect(result.backend).toBe("fallback");
    expect(rolesOf(fake.complete.mock.calls)).toEqual(["fallback"]);
  });

  it("does not fall back when only the primary is configured", async () => {
    const fake = fakeClient();
    fake.complete.mockRejectedValue(new TransportError("primary down"));
    const dispatcher = createDispatcher({ primary, fallback: unset(fallback), client: fake.client });

    await expect(dispatcher.dispatch(messages, options)).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(rolesOf(fake.complete.mock.calls)).toEqual(["primary"]);
  });

  it("fails without any outbound call when nothing is configured", async () => {
    const fake = fakeClient();
    const dispatcher = createDispatcher({ primary: unset(primary), fallback: unset(fallback), client: fake.client });

    const error = await dispatcher.dispatch(messages, options).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ServiceUnavailableError);
    expect(error).toMatchObject({ status: 503, message: NO_BACKEND_MESSAGE });
    expect(fake.complete).not.toHaveBeenCalled();
  });

  it("rethrows the primary's error without trying the fallback once the caller aborted", async () => {
    const fake = fakeClient();
    const controller = new AbortController();
    fake.complete.mockImplementation(async () => {
      controller.abort();
      throw new TransportError("request aborted");
    });
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    await expect(dispatcher.dispatch(messages, { ...options, signal: controller.signal })).rejects.toThrow(
      "request aborted"
    );
    expect(rolesOf(fake.complete.mock.calls)).toEqual(["primary"]);
  });

  it("retries a failed primary on the next call", async () => {
    const fake = fakeClient();
    fake.complete
      .mockRejectedValueOnce(new TransportError("blip"))
      .mockResolvedValueOnce("fallback answer")
      .mockResolvedValueOnce("primary again");
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    await dispatcher.dispatch(messages, options);
    const second = await dispatcher.dispatch(messages, options);

    expect(second.backend).toBe("primary");
    expect(rolesOf(fake.complete.mock.calls)).toEqual(["primary", "fallback", "primary"]);
  });
});

describe("stream", () => {
  it("relays the primary's frames in order", async () => {
    const fake = fakeClient();
    fake.openStream.mockResolvedValue(frames(["data: a\n\n", "data: b\n\n", "data: [DONE]\n\n"]));
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    expect(await collect(dispatcher.stream(messages, options))).toEqual([
      "data: a\n\n",
      "data: b\n\n",
      "data: [DONE]\n\n",
    ]);
    expect(rolesOf(fake.openStream.mock.calls)).toEqual(["primary"]);
  });

  it("opens the fallback when the primary stream cannot be opened", async () => {
    const fake = fakeClient();
    fake.openStream.mockImplementation(async (backend) => {
      if (backend.role === "primary") throw new ProtocolError("HTTP 503", 503);
      return frames(["data: from-fallback\n\n"]);
    });
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    expect(await collect(dispatcher.stream(messages, options))).toEqual(["data: from-fallback\n\n"]);
    expect(rolesOf(fake.openStream.mock.calls)).toEqual(["primary", "fallback"]);
  });

  it("keeps frames already relayed and skips the fallback after a mid-stream failure", async () => {
    const fake = fakeClient();
    fake.openStream.mockResolvedValue(frames(["data: 1\n\n", "data: 2\n\n"], new TransportError("stream interrupted")));
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    const seen: string[] = [];
    const consume = async () => {
      for await (const frame of dispatcher.stream(messages, options)) seen.push(frame);
    };

    await expect(consume()).rejects.toThrow("stream interrupted");
    expect(seen).toEqual(["data: 1\n\n", "data: 2\n\n"]);
    expect(rolesOf(fake.openStream.mock.calls)).toEqual(["primary"]);
  });

  it("propagates the fallback's open failure", async () => {
    const fake = fakeClient();
    fake.openStream.mockImplementation(async (backend) => {
      throw new TransportError(`${backend.role} unreachable`);
    });
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    await expect(collect(dispatcher.stream(messages, options))).rejects.toThrow("fallback unreachable");
  });

  it("yields exactly one error frame when nothing is configured", async () => {
    const fake = fakeClient();
    const dispatcher = createDispatcher({ primary: unset(primary), fallback: unset(fallback), client: fake.client });

    expect(await collect(dispatcher.stream(messages, options))).toEqual([
      'data: {"error":"No LLM backend available."}\n\n',
    ]);
    expect(fake.openStream).not.toHaveBeenCalled();
  });

  it("does not open anything until iterated", () => {
    const fake = fakeClient();
    const dispatcher = createDispatcher({ primary, fallback, client: fake.client });

    dispatcher.stream(messages, options);

    expect(fake.openStream).not.toHaveBeenCalled();
  });
});

describe("backends", () => {
  it("lists primary then fallback", () => {
    const dispatcher = createDispatcher({ primary, fallback, client: fakeClient().client });
    expect(dispatcher.backends().map((b) => b.role)).toEqual(["primary", "fallback"]);
  });
});
