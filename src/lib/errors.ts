/**
 * Standardized Error Handling
 *
 * Provides the error response format for the read API and the typed errors
 * raised at the persistence and configuration boundaries.
 * Format: { error: string, code: string, details?: unknown }
 */

import type { Context } from "hono";

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
}

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 400 Bad Request
  VALIDATION_FAILED: { status: 400, code: "validation_failed" },
  UNKNOWN_DIMENSION: { status: 400, code: "unknown_dimension" },

  // 404 Not Found
  NO_OBSERVATIONS: { status: 404, code: "no_observations" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, code: "internal_error" },

  // 503 Service Unavailable
  PERSISTENCE_UNAVAILABLE: { status: 503, code: "persistence_unavailable" },
} as const;

export type ErrorCodeKey = keyof typeof ErrorCodes;

/**
 * Create a standardized API error response
 */
export function apiError(c: Context, errorCode: ErrorCodeKey, details?: unknown) {
  const { status, code } = ErrorCodes[errorCode];
  const response: ApiError = {
    error: code,
    code,
    ...(details !== undefined && { details }),
  };
  return c.json(response, status);
}

/**
 * Extract a readable message from any thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

// ---------------------------------------------------------------------------
// Typed errors
// ---------------------------------------------------------------------------

/**
 * The store stayed busy/locked (or otherwise failed) through every retry
 * attempt for a single record.
 */
export class PersistenceFailure extends Error {
  public readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceFailure";
    this.attempts = attempts;
  }
}

/**
 * An insert lost a uniqueness race and the winning row could not be read back.
 */
export class DuplicateKeyRace extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DuplicateKeyRace";
  }
}

/**
 * Environment or pipeline configuration failed validation.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
