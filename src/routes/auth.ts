import { timingSafeEqual } from "crypto";
import type { RequestHandler } from "express";
import { UnauthorizedError } from "../llm/errors.js";

function sameSecret(given: string, expected: string): boolean {
  const a = Buffer.from(given, "utf-8");
  const b = Buffer.from(expected, "utf-8");
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Gate for endpoints that spend backend quota. A null secret leaves the gate open.
 */
export function requireApiKey(secret: string | null): RequestHandler {
  return (req, res, next) => {
    if (secret == null) {
      next();
      return;
    }
    const given = req.get("x-api-key");
    if (given !== undefined && sameSecret(given, secret)) {
      next();
      return;
    }
    const err = new UnauthorizedError();
    res.status(err.status).json({ ok: false, error: err.message });
  };
}
