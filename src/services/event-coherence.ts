/**
 * Event Coherence Composite
 *
 * Blends the synchronization score with min-max normalized asymmetry,
 * smooths the blend with a centered moving average and clamps it to
 * [0, 1]. Days above the threshold are an "event regime".
 */

import {
  DEFAULT_ASYMMETRY_WINDOW_DAYS,
  DEFAULT_EVENT_THRESHOLD,
  DEFAULT_SMOOTHING_WINDOW_DAYS,
  DEFAULT_SYNC_THRESHOLD_K,
  DEFAULT_SYNC_WEIGHT,
  DEFAULT_ASYMMETRY_WEIGHT,
} from "../config/constants.ts";
import { coherenceWeightsSchema, type CoherenceWeights } from "../config/pipeline-config.ts";
import { ConfigurationError } from "../lib/errors.ts";
import { centeredMovingAverage, clamp, normalize } from "../lib/math-utils.ts";
import type { CoherenceSampleRow } from "../db/repository.ts";
import type { AlignedSeries } from "./daily-series.ts";
import { computeAsymmetry } from "./asymmetry.ts";
import { computeSynchronization } from "./synchronization.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CoherenceOptions {
  weights: CoherenceWeights;
  syncThresholdK: number;
  asymmetryWindowDays: number;
  smoothingWindowDays: number;
  eventThreshold: number;
}

export interface CoherenceSample extends CoherenceSampleRow {
  /** Min-max normalized asymmetry, as blended into the index */
  normalizedAsymmetry: number | null;
  isEventRegime: boolean;
}

export const DEFAULT_COHERENCE_OPTIONS: CoherenceOptions = {
  weights: { sync: DEFAULT_SYNC_WEIGHT, asymmetry: DEFAULT_ASYMMETRY_WEIGHT },
  syncThresholdK: DEFAULT_SYNC_THRESHOLD_K,
  asymmetryWindowDays: DEFAULT_ASYMMETRY_WINDOW_DAYS,
  smoothingWindowDays: DEFAULT_SMOOTHING_WINDOW_DAYS,
  eventThreshold: DEFAULT_EVENT_THRESHOLD,
};

// ---------------------------------------------------------------------------
// Composite
// ---------------------------------------------------------------------------

/**
 * Weighted blend, null wherever asymmetry is null.
 */
export function blendCoherence(
  sync: readonly number[],
  normalizedAsymmetry: ReadonlyArray<number | null>,
  weights: CoherenceWeights,
): Array<number | null> {
  return sync.map((s, i) => {
    const a = normalizedAsymmetry[i];
    return a === null || a === undefined ? null : weights.sync * s + weights.asymmetry * a;
  });
}

/**
 * One sample per day of the aligned series.
 */
export function computeEventCoherence(
  aligned: AlignedSeries,
  options: CoherenceOptions = DEFAULT_COHERENCE_OPTIONS,
): CoherenceSample[] {
  const weights = coherenceWeightsSchema.safeParse(options.weights);
  if (!weights.success) {
    throw new ConfigurationError(`Invalid coherence weights: ${weights.error.issues[0]?.message ?? "unknown"}`);
  }

  const sync = computeSynchronization(aligned.values, options.syncThresholdK).map((p) => p.score);
  if (sync.length === 0) return [];

  const rawAsymmetry = computeAsymmetry(aligned.values, options.asymmetryWindowDays);
  const asymmetry = normalize(rawAsymmetry);
  const smoothed = centeredMovingAverage(
    blendCoherence(sync, asymmetry, weights.data),
    options.smoothingWindowDays,
  );

  return aligned.days.map((day, i) => {
    const value = smoothed[i];
    const index = value === null ? null : clamp(value, 0, 1);
    return {
      day,
      coherenceScore: sync[i],
      asymmetryScore: rawAsymmetry[i],
      normalizedAsymmetry: asymmetry[i],
      eventCoherenceIndex: index,
      isEventRegime: index !== null && index > options.eventThreshold,
    };
  });
}

/**
 * Days with the highest index, best first. Days without an index are
 * never ranked; ties go to the earlier day.
 */
export function topCoherenceDays<T extends Pick<CoherenceSampleRow, "day" | "eventCoherenceIndex">>(
  samples: readonly T[],
  n: number,
): T[] {
  return samples
    .filter((s) => s.eventCoherenceIndex !== null)
    .sort((a, b) => (b.eventCoherenceIndex ?? 0) - (a.eventCoherenceIndex ?? 0) || a.day.localeCompare(b.day))
    .slice(0, Math.max(0, n));
}

export function toCoherenceRow(sample: CoherenceSample): CoherenceSampleRow {
  return {
    day: sample.day,
    coherenceScore: sample.coherenceScore,
    asymmetryScore: sample.asymmetryScore,
    eventCoherenceIndex: sample.eventCoherenceIndex,
  };
}
