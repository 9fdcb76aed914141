/**
 * Shared scorer contracts.
 *
 * Lexical scorers are plain functions of text. Model-backed scorers go
 * through an `InferenceModel`, and every call ends in a `ScorerOutcome`:
 * a score on success, or the dimension's neutral default plus a reason on
 * failure. Nothing in this layer throws to the assembler.
 */

import type { DimensionKey } from "../schemas/dimension-vector.ts";

/**
 * Raw model output: a number (compound/regression score) or a
 * classification label with its confidence.
 */
export type InferenceOutput = number | { label: string; confidence: number };

export interface InferenceModel {
  /** Model name, for logs */
  readonly name: string;
  /**
   * Score one text. Implementations should abort their own request after
   * `timeoutMs`; the caller also enforces the bound.
   */
  infer(text: string, timeoutMs: number): Promise<InferenceOutput>;
}

/** Dimensions produced by a model rather than a lexicon */
export type ModelDimension =
  | "emotionalValence"
  | "temporalBleed"
  | "agencyReversal"
  | "metaphorDensity"
  | "novelMeme";

export const MODEL_DIMENSIONS: readonly ModelDimension[] = [
  "emotionalValence",
  "temporalBleed",
  "agencyReversal",
  "metaphorDensity",
  "novelMeme",
];

export type ModelRegistry = Partial<Record<ModelDimension, InferenceModel>>;

export type ScorerFailureReason =
  | "unconfigured"
  | "timeout"
  | "unavailable"
  | "malformed_output";

export type ScorerOutcome =
  | {
      success: true;
      dimension: DimensionKey;
      score: number;
      durationMs: number;
    }
  | {
      success: false;
      dimension: DimensionKey;
      /** Neutral default used in place of a score */
      score: number;
      reason: ScorerFailureReason;
      error: string;
      durationMs: number;
    };

/**
 * Thrown by model adapters when a response arrives but cannot be read as a
 * score. Surfaces as a `malformed_output` outcome.
 */
export class MalformedModelOutput extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedModelOutput";
  }
}

/**
 * Thrown when a model call exceeds its per-dimension bound.
 */
export class ScorerTimeout extends Error {
  constructor(model: string, timeoutMs: number) {
    super(`${model} timed out after ${timeoutMs}ms`);
    this.name = "ScorerTimeout";
  }
}
