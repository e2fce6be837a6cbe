import type { Response } from "express";
import type { ServerResponse } from "http";
import type { z } from "zod";
import type { CallResult } from "../llm/dispatch.js";
import type { StreamFrame } from "../llm/client.js";
import { GatewayError, ValidationError, errorMessage, formatZodError } from "../llm/errors.js";
import { errorFrame } from "../llm/sse.js";

export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) throw new ValidationError(formatZodError(result.error));
  return result.data;
}

/** Aborts when the client disconnects before the response is complete. */
export function abortOnClose(res: Response): AbortController {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller;
}

export function secondsSince(startedAt: number): number {
  return Math.round((Date.now() - startedAt) / 10) / 100;
}

export function logCompletion(route: string, result: CallResult, latencySeconds: number): void {
  console.log(`[${route}] ${result.backend} ${result.model} ${latencySeconds}s`);
}

export function sendError(res: Response, err: unknown, route: string): void {
  const status = err instanceof GatewayError ? err.status : 500;
  if (status >= 500) console.error(`[${route}] ${errorMessage(err)}`);
  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(status).json({ ok: false, error: errorMessage(err) });
}

/** Resolves once the response can take more data, or has closed. */
function drained(res: ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.on("drain", done);
    res.on("close", done);
  });
}

/**
 * Write frames as server-sent events, pausing while the socket buffer is full. A failure after
 * the headers went out becomes one final error frame; the response is always ended.
 */
export async function relayFrames(
  res: ServerResponse,
  frames: AsyncIterable<StreamFrame>,
  route: string
): Promise<void> {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders();

  try {
    for await (const frame of frames) {
      if (res.destroyed) break;
      if (!res.write(frame)) await drained(res);
    }
  } catch (err) {
    if (!res.destroyed) {
      console.error(`[${route}] stream failed: ${errorMessage(err)}`);
      res.write(errorFrame(errorMessage(err)));
    }
  } finally {
    res.end();
  }
}
