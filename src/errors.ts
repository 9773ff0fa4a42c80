/**
 * Error taxonomy and translation into the `{code, message}` envelope.
 */

import { ZodError } from "zod";
import type { Token } from "./models/token";
import { errorStatus, type ErrorStatus } from "./models/status";
import { toError } from "./utils/result";

export class ServiceError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }

  toStatus(): ErrorStatus {
    return errorStatus(this.status, this.message);
  }
}

export class RouteNotFoundError extends ServiceError {
  constructor() {
    super(404, "not found");
  }
}

export class UnauthorizedError extends ServiceError {
  /** Token matched during lookup, if any; kept for audit attribution. */
  readonly token: Token | null;

  constructor(token: Token | null = null) {
    super(401, "Unauthorized request!");
    this.token = token;
  }
}

/** Wraps whatever a handler raised. Only the message reaches the client. */
export class HandlerFailureError extends ServiceError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(500, `Internal server error: ${toError(cause).message}`, { cause });
    this.path = path;
  }
}

/** Non-fatal: logged, never surfaced to the client. */
export class AuditWriteFailureError extends ServiceError {
  constructor(cause: unknown) {
    super(500, `Failed to append access record: ${toError(cause).message}`, { cause });
  }
}

export class RouteConflictError extends ServiceError {
  constructor(verb: string, path: string) {
    super(500, `Route ${verb} ${path} is registered more than once`);
  }
}

export class ConfigError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message, options);
  }
}

export class InvalidPayloadError extends ServiceError {
  constructor(message: string) {
    super(400, message);
  }
}

export class MalformedBodyError extends ServiceError {
  constructor(cause: unknown, status = 400) {
    super(status, `Malformed request body: ${toError(cause).message}`, { cause });
  }
}

export class PayloadTooLargeError extends ServiceError {
  constructor(limit: string, options?: { cause?: unknown }) {
    super(413, `Request body exceeds the ${limit} limit`, options);
  }
}

/** Token store failures while authorizing; the client sees a 500. */
export class TokenLookupError extends ServiceError {
  constructor(cause: unknown) {
    super(500, `Internal server error: ${toError(cause).message}`, { cause });
  }
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Maps any failure to the envelope. Unknown errors become 500s carrying
 * only their message.
 */
export function translateError(error: unknown): ErrorStatus {
  if (error instanceof ServiceError) {
    return error.toStatus();
  }
  return errorStatus(500, `Internal server error: ${toError(error).message}`);
}
