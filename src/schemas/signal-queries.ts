/**
 * Query parameter schemas for the read API.
 *
 * Query values arrive as strings; numeric fields are coerced.
 */

import { z } from "zod";
import { MAX_WORD_LIMIT } from "../config/constants.ts";
import { isDayKey } from "../lib/date-utils.ts";

/** Longest range a single request may span */
const MAX_RANGE_DAYS = 3660;

/** Longest event half-window accepted by the validation endpoint */
const MAX_EVENT_WINDOW_DAYS = 30;

export const dayKeySchema = z.string().refine(isDayKey, { message: "must be a YYYY-MM-DD date" });

export const dayRangeQuerySchema = z
  .object({
    start: dayKeySchema,
    end: dayKeySchema,
  })
  .refine((q) => q.start <= q.end, { message: "start must not be after end", path: ["start"] })
  .refine((q) => Date.parse(q.end) - Date.parse(q.start) <= MAX_RANGE_DAYS * 86_400_000, {
    message: `range may span at most ${MAX_RANGE_DAYS} days`,
    path: ["end"],
  });

export type DayRangeQuery = z.infer<typeof dayRangeQuerySchema>;

/** Optional target window scored against the stored baseline */
export const baselineQuerySchema = z
  .object({
    start: dayKeySchema.optional(),
    end: dayKeySchema.optional(),
  })
  .refine((q) => (q.start === undefined) === (q.end === undefined), {
    message: "start and end must be given together",
    path: ["start"],
  })
  .refine((q) => q.start === undefined || q.end === undefined || q.start <= q.end, {
    message: "start must not be after end",
    path: ["start"],
  });

export const coherenceQuerySchema = z
  .object({
    start: dayKeySchema,
    end: dayKeySchema,
    top: z.coerce.number().int().min(1).max(100).default(10),
  })
  .refine((q) => q.start <= q.end, { message: "start must not be after end", path: ["start"] });

export const wordQuerySchema = z
  .object({
    minScore: z.coerce.number().finite().optional(),
    maxScore: z.coerce.number().finite().optional(),
    limit: z.coerce.number().int().min(1).max(MAX_WORD_LIMIT).optional(),
  })
  .refine((q) => q.minScore === undefined || q.maxScore === undefined || q.minScore <= q.maxScore, {
    message: "minScore must not exceed maxScore",
    path: ["minScore"],
  });

export const eventValidationQuerySchema = z.object({
  event: dayKeySchema,
  window: z.coerce.number().int().min(0).max(MAX_EVENT_WINDOW_DAYS).default(3),
  platform: z.string().min(1).optional(),
});
