/**
 * Dimension Vector Zod Schemas
 *
 * The fixed twelve-dimension record every text unit reduces to.
 * - Range bounds and neutral defaults per dimension
 * - Rounding to VECTOR_PRECISION happens once, in `buildDimensionVector`
 * - `dimensionKeySchema` validates dimension names arriving over the API
 */

import { z } from "zod";
import { VECTOR_PRECISION } from "../config/constants.ts";
import { clamp, round } from "../lib/math-utils.ts";

export const DIMENSION_KEYS = [
  "certaintyCollapse",
  "pronounFirst",
  "pronounThird",
  "pronounCollective",
  "emotionalValence",
  "temporalBleed",
  "timeCompression",
  "sacredProfane",
  "temporalProximity",
  "agencyReversal",
  "metaphorDensity",
  "novelMeme",
] as const;

export const dimensionKeySchema = z.enum(DIMENSION_KEYS);

export type DimensionKey = z.infer<typeof dimensionKeySchema>;

export type DimensionFamily = "lexical" | "sentiment" | "reasoning" | "regression";

export interface DimensionSpec {
  min: number;
  max: number;
  neutral: number;
  family: DimensionFamily;
}

export const DIMENSION_SPECS: Record<DimensionKey, DimensionSpec> = {
  certaintyCollapse: { min: -1, max: 1, neutral: 0, family: "lexical" },
  pronounFirst: { min: 0, max: 1, neutral: 0, family: "lexical" },
  pronounThird: { min: 0, max: 1, neutral: 0, family: "lexical" },
  pronounCollective: { min: 0, max: 1, neutral: 0, family: "lexical" },
  emotionalValence: { min: -1, max: 1, neutral: 0, family: "sentiment" },
  temporalBleed: { min: 0, max: 1, neutral: 0, family: "reasoning" },
  timeCompression: { min: 0, max: 1, neutral: 0, family: "lexical" },
  sacredProfane: { min: -1, max: 1, neutral: 0, family: "lexical" },
  temporalProximity: { min: 0, max: 1, neutral: 0.5, family: "lexical" },
  agencyReversal: { min: 0, max: 1, neutral: 0, family: "regression" },
  metaphorDensity: { min: 0, max: 1, neutral: 0, family: "regression" },
  novelMeme: { min: 0, max: 1, neutral: 0, family: "regression" },
};

const signedScore = z.number().finite().min(-1).max(1);
const unitScore = z.number().finite().min(0).max(1);

/**
 * Range-checked vector. Every component is required.
 */
export const dimensionVectorSchema = z.object({
  certaintyCollapse: signedScore,
  pronounFirst: unitScore,
  pronounThird: unitScore,
  pronounCollective: unitScore,
  emotionalValence: signedScore,
  temporalBleed: unitScore,
  timeCompression: unitScore,
  sacredProfane: signedScore,
  temporalProximity: unitScore,
  agencyReversal: unitScore,
  metaphorDensity: unitScore,
  novelMeme: unitScore,
});

export type DimensionVector = z.infer<typeof dimensionVectorSchema>;

/**
 * Assemble a vector from partial scores: missing dimensions take their
 * neutral default, every component is clamped to its range and rounded.
 * The result is validated against `dimensionVectorSchema`.
 */
export function buildDimensionVector(scores: Partial<Record<DimensionKey, number>>): DimensionVector {
  const raw: Record<string, number> = {};
  for (const key of DIMENSION_KEYS) {
    const spec = DIMENSION_SPECS[key];
    const value = scores[key];
    const usable = value !== undefined && Number.isFinite(value) ? value : spec.neutral;
    // round(-0.0004) is -0; normalise so equality lookups match stored zeros
    raw[key] = round(clamp(usable, spec.min, spec.max), VECTOR_PRECISION) + 0;
  }
  return dimensionVectorSchema.parse(raw);
}

/**
 * Stable string key for a vector (map keys, log lines).
 */
export function vectorKey(vector: DimensionVector): string {
  return DIMENSION_KEYS.map((key) => vector[key].toFixed(VECTOR_PRECISION)).join("|");
}

/**
 * Dimensions that carry a real score for a run. Without models the
 * model-backed dimensions hold their neutral default on every unit.
 */
export function scoredDimensions(useModels: boolean): DimensionKey[] {
  return DIMENSION_KEYS.filter((key) => useModels || DIMENSION_SPECS[key].family === "lexical");
}
