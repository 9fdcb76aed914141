/**
 * Input Validation
 *
 * Zod-based query validation for Hono routes. On failure the caller
 * returns the prepared 400 response as-is.
 */

import type { Context } from "hono";
import type { z } from "zod";
import { ErrorCodes } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Validation error response format
// ---------------------------------------------------------------------------

export interface ValidationErrorResponse {
  error: string;
  code: string;
  status: number;
  details: {
    issues: Array<{
      path: string;
      message: string;
    }>;
  };
}

export type QueryParseResult<T> = { ok: true; data: T } | { ok: false; response: Response };

// ---------------------------------------------------------------------------
// Query parser
// ---------------------------------------------------------------------------

export function formatIssues(error: z.ZodError): ValidationErrorResponse["details"] {
  return {
    issues: error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    })),
  };
}

/**
 * Validate the request's query string against `schema`.
 *
 * @example
 * const query = parseQuery(c, dayRangeQuerySchema);
 * if (!query.ok) return query.response;
 */
export function parseQuery<T extends z.ZodTypeAny>(c: Context, schema: T): QueryParseResult<z.output<T>> {
  const result = schema.safeParse(c.req.query());
  if (result.success) return { ok: true, data: result.data };

  const resp: ValidationErrorResponse = {
    error: "Invalid query parameters",
    code: ErrorCodes.VALIDATION_FAILED.code,
    status: 400,
    details: formatIssues(result.error),
  };
  return { ok: false, response: c.json(resp, 400) };
}
