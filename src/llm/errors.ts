import type { ZodError } from "zod";

/** Base class for errors that map onto an HTTP status. */
export class GatewayError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/** A backend was invoked without its credential. */
export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super(message, 503);
  }
}

/** Network failure, timeout or abort while talking to a backend. */
export class TransportError extends GatewayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 502, options);
  }
}

/** Non-2xx status or a response body without usable choices. */
export class ProtocolError extends GatewayError {
  readonly upstreamStatus: number | null;

  constructor(message: string, upstreamStatus: number | null = null) {
    super(message, 502);
    this.upstreamStatus = upstreamStatus;
  }
}

/** Malformed request body or query. */
export class ValidationError extends GatewayError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ServiceUnavailableError extends GatewayError {
  constructor(message: string) {
    super(message, 503);
  }
}

export class UnauthorizedError extends GatewayError {
  constructor(message = "Unauthorized: invalid or missing X-Api-Key header.") {
    super(message, 401);
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, 404);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** "path: message" per issue, joined with "; ". */
export function formatZodError(err: ZodError): string {
  return err.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}
