/**
 * Model-backed scorer runner.
 *
 * Turns one `InferenceModel` call into a `ScorerOutcome`:
 * - bounded by a per-dimension timeout
 * - numeric output clamped to the dimension's range
 * - sentiment labels mapped to signed confidence
 * - every failure becomes the neutral default plus a reason
 */

import { DIMENSION_SPECS } from "../schemas/dimension-vector.ts";
import { clamp } from "../lib/math-utils.ts";
import { errorMessage } from "../lib/errors.ts";
import { incrementCounter, logger } from "../services/structured-logger.ts";
import {
  MalformedModelOutput,
  ScorerTimeout,
  type InferenceModel,
  type InferenceOutput,
  type ModelDimension,
  type ScorerFailureReason,
  type ScorerOutcome,
} from "./types.ts";

const POSITIVE_LABELS = new Set(["positive", "pos", "label_2"]);
const NEGATIVE_LABELS = new Set(["negative", "neg", "label_0"]);
const NEUTRAL_LABELS = new Set(["neutral", "neu", "label_1"]);

/**
 * Convert a raw model output into a score for `dimension`.
 * Throws MalformedModelOutput when the output cannot be read.
 *
 * @example
 * interpretOutput("emotionalValence", { label: "NEGATIVE", confidence: 0.9 }) // -0.9
 * interpretOutput("novelMeme", 1.7) // 1
 */
export function interpretOutput(dimension: ModelDimension, output: InferenceOutput): number {
  const { min, max } = DIMENSION_SPECS[dimension];

  if (typeof output === "number") {
    if (!Number.isFinite(output)) {
      throw new MalformedModelOutput(`non-finite score for ${dimension}`);
    }
    return clamp(output, min, max);
  }

  if (dimension !== "emotionalValence") {
    throw new MalformedModelOutput(`${dimension} expects a numeric score, got label "${output.label}"`);
  }
  if (!Number.isFinite(output.confidence)) {
    throw new MalformedModelOutput(`non-finite confidence for label "${output.label}"`);
  }

  const label = output.label.toLowerCase();
  const confidence = clamp(output.confidence, 0, 1);
  if (POSITIVE_LABELS.has(label)) return confidence;
  if (NEGATIVE_LABELS.has(label)) return -confidence;
  if (NEUTRAL_LABELS.has(label)) return 0;
  throw new MalformedModelOutput(`unknown sentiment label "${output.label}"`);
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ScorerTimeout(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function classifyFailure(err: unknown): ScorerFailureReason {
  if (err instanceof ScorerTimeout) return "timeout";
  if (err instanceof MalformedModelOutput) return "malformed_output";
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) return "timeout";
  return "unavailable";
}

/**
 * Score one dimension with its model. Never throws.
 */
export async function runModelScorer(
  dimension: ModelDimension,
  model: InferenceModel | undefined,
  text: string,
  timeoutMs: number,
): Promise<ScorerOutcome> {
  const neutral = DIMENSION_SPECS[dimension].neutral;
  const startMs = Date.now();

  if (!model) {
    return {
      success: false,
      dimension,
      score: neutral,
      reason: "unconfigured",
      error: `no model configured for ${dimension}`,
      durationMs: 0,
    };
  }

  try {
    const output = await withTimeout(model.infer(text, timeoutMs), timeoutMs, model.name);
    return {
      success: true,
      dimension,
      score: interpretOutput(dimension, output),
      durationMs: Date.now() - startMs,
    };
  } catch (err) {
    const reason = classifyFailure(err);
    const error = errorMessage(err);
    incrementCounter(`scorer_failure.${dimension}`);
    logger.warn("model-scorer", `${dimension} scorer failed (${reason})`, {
      model: model.name,
      error: error.slice(0, 200),
    });
    return {
      success: false,
      dimension,
      score: neutral,
      reason,
      error,
      durationMs: Date.now() - startMs,
    };
  }
}
