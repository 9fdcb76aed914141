/**
 * Global Error Handler Middleware
 *
 * Catches unhandled errors in any route and returns a consistent
 * structured JSON response: { error, code, status }.
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import { ConfigurationError, ErrorCodes, PersistenceFailure } from "../lib/errors.ts";
import { logger } from "../services/structured-logger.ts";
import { UnknownDimensionError } from "../services/word-dimensions.ts";

// ---------------------------------------------------------------------------
// Error response type
// ---------------------------------------------------------------------------

export interface StructuredError {
  error: string;
  code: string;
  status: 400 | 404 | 500 | 503;
}

// ---------------------------------------------------------------------------
// Error mapper: known error types → structured response
// ---------------------------------------------------------------------------

export function mapErrorToResponse(err: unknown): StructuredError {
  if (err instanceof UnknownDimensionError) {
    return { error: err.message, code: ErrorCodes.UNKNOWN_DIMENSION.code, status: 400 };
  }

  if (err instanceof ZodError) {
    return { error: "Validation failed", code: ErrorCodes.VALIDATION_FAILED.code, status: 400 };
  }

  if (err instanceof PersistenceFailure) {
    return { error: "Store unavailable", code: ErrorCodes.PERSISTENCE_UNAVAILABLE.code, status: 503 };
  }

  // Misconfiguration is an operator problem; never echo its details
  if (err instanceof ConfigurationError) {
    return { error: "Service misconfigured", code: ErrorCodes.INTERNAL_ERROR.code, status: 500 };
  }

  return { error: "Internal server error", code: ErrorCodes.INTERNAL_ERROR.code, status: 500 };
}

// ---------------------------------------------------------------------------
// Hono handlers
// ---------------------------------------------------------------------------

/**
 * Usage:
 *   app.onError(globalErrorHandler);
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  const structured = mapErrorToResponse(err);

  if (structured.status >= 500) {
    logger.error("http", `${c.req.method} ${c.req.path} failed`, err, { status: structured.status });
  } else {
    logger.warn("http", `${c.req.method} ${c.req.path} rejected`, { code: structured.code });
  }

  return c.json(structured, structured.status);
}

/**
 * Usage:
 *   app.notFound(notFoundHandler);
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    {
      error: `Route ${c.req.method} ${c.req.path} not found`,
      code: "not_found",
      status: 404,
    },
    404,
  );
}
