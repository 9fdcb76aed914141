/**
 * Pipeline configuration.
 *
 * One validated object carries every tunable the scoring, batch and
 * statistics stages read. Built from the environment plus explicit
 * overrides; invalid combinations (negative weights, weights not summing
 * to 1, inverted offset ranges) fail with a ConfigurationError.
 */

import { z } from "zod";
import { ConfigurationError } from "../lib/errors.ts";
import type { Env } from "./env.ts";
import {
  DEFAULT_ASYMMETRY_WEIGHT,
  DEFAULT_ASYMMETRY_WINDOW_DAYS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_CONTROL_MAX_OFFSET_DAYS,
  DEFAULT_CONTROL_MIN_OFFSET_DAYS,
  DEFAULT_CONTROL_SEED,
  DEFAULT_CONTROL_WINDOW_COUNT,
  DEFAULT_EVENT_BASELINE_DAYS,
  DEFAULT_EVENT_THRESHOLD,
  DEFAULT_MAX_BATCH_ERRORS,
  DEFAULT_SCORER_TIMEOUT_MS,
  DEFAULT_SMOOTHING_WINDOW_DAYS,
  DEFAULT_SYNC_THRESHOLD_K,
  DEFAULT_SYNC_WEIGHT,
  DEFAULT_WARNING_WINDOW_DAYS,
  PERSISTENCE_BASE_DELAY_MS,
  PERSISTENCE_MAX_ATTEMPTS,
  ZERO_VARIANCE_Z_SENTINEL,
} from "./constants.ts";

const WEIGHT_SUM_TOLERANCE = 1e-9;

export const coherenceWeightsSchema = z
  .object({
    sync: z.number().min(0),
    asymmetry: z.number().min(0),
  })
  .refine((w) => Math.abs(w.sync + w.asymmetry - 1) <= WEIGHT_SUM_TOLERANCE, {
    message: "coherence weights must sum to 1",
  });

export type CoherenceWeights = z.infer<typeof coherenceWeightsSchema>;

export const controlWindowOptionsSchema = z
  .object({
    count: z.number().int().positive(),
    minOffsetDays: z.number().int().positive(),
    maxOffsetDays: z.number().int().positive(),
    seed: z.number().int(),
  })
  .refine((c) => c.maxOffsetDays > c.minOffsetDays, {
    message: "maxOffsetDays must exceed minOffsetDays",
  });

export type ControlWindowOptions = z.infer<typeof controlWindowOptionsSchema>;

export const pipelineConfigSchema = z.object({
  referenceYear: z.number().int().min(2000).max(2099),
  useModels: z.boolean(),
  scorerTimeoutMs: z.number().int().positive(),
  batchSize: z.number().int().positive(),
  maxErrors: z.number().int().nonnegative(),
  persistence: z.object({
    maxAttempts: z.number().int().positive(),
    baseDelayMs: z.number().int().nonnegative(),
  }),
  syncThresholdK: z.number().positive(),
  asymmetryWindowDays: z.number().int().positive(),
  weights: coherenceWeightsSchema,
  smoothingWindowDays: z.number().int().positive(),
  eventThreshold: z.number().min(0).max(1),
  zeroVarianceSentinel: z.number(),
  warningWindowDays: z.number().int().positive(),
  eventBaselineDays: z.number().int().positive(),
  controls: controlWindowOptionsSchema,
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export type PipelineConfigOverrides = Partial<PipelineConfig>;

/**
 * Defaults with the reference year taken from `now` (UTC).
 */
export function defaultPipelineConfig(now: Date = new Date()): PipelineConfig {
  return {
    referenceYear: now.getUTCFullYear(),
    useModels: false,
    scorerTimeoutMs: DEFAULT_SCORER_TIMEOUT_MS,
    batchSize: DEFAULT_BATCH_SIZE,
    maxErrors: DEFAULT_MAX_BATCH_ERRORS,
    persistence: {
      maxAttempts: PERSISTENCE_MAX_ATTEMPTS,
      baseDelayMs: PERSISTENCE_BASE_DELAY_MS,
    },
    syncThresholdK: DEFAULT_SYNC_THRESHOLD_K,
    asymmetryWindowDays: DEFAULT_ASYMMETRY_WINDOW_DAYS,
    weights: { sync: DEFAULT_SYNC_WEIGHT, asymmetry: DEFAULT_ASYMMETRY_WEIGHT },
    smoothingWindowDays: DEFAULT_SMOOTHING_WINDOW_DAYS,
    eventThreshold: DEFAULT_EVENT_THRESHOLD,
    zeroVarianceSentinel: ZERO_VARIANCE_Z_SENTINEL,
    warningWindowDays: DEFAULT_WARNING_WINDOW_DAYS,
    eventBaselineDays: DEFAULT_EVENT_BASELINE_DAYS,
    controls: {
      count: DEFAULT_CONTROL_WINDOW_COUNT,
      minOffsetDays: DEFAULT_CONTROL_MIN_OFFSET_DAYS,
      maxOffsetDays: DEFAULT_CONTROL_MAX_OFFSET_DAYS,
      seed: DEFAULT_CONTROL_SEED,
    },
  };
}

/**
 * Validate a full config object, throwing ConfigurationError on failure.
 */
export function validatePipelineConfig(candidate: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigurationError(`Pipeline configuration invalid:\n${issues}`);
  }
  return result.data;
}

/**
 * Layer env values and overrides over the defaults, then validate.
 * Precedence: overrides > env > defaults.
 */
export function buildPipelineConfig(
  env: Partial<Env> = {},
  overrides: PipelineConfigOverrides = {},
  now: Date = new Date(),
): PipelineConfig {
  const defaults = defaultPipelineConfig(now);

  const fromEnv: PipelineConfigOverrides = {
    ...(env.REFERENCE_YEAR !== undefined && { referenceYear: env.REFERENCE_YEAR }),
    ...(env.USE_MODEL_SCORERS !== undefined && { useModels: env.USE_MODEL_SCORERS }),
    ...(env.SCORER_TIMEOUT_MS !== undefined && { scorerTimeoutMs: env.SCORER_TIMEOUT_MS }),
    ...(env.BATCH_SIZE !== undefined && { batchSize: env.BATCH_SIZE }),
    ...(env.MAX_BATCH_ERRORS !== undefined && { maxErrors: env.MAX_BATCH_ERRORS }),
  };

  return validatePipelineConfig({ ...defaults, ...fromEnv, ...overrides });
}
