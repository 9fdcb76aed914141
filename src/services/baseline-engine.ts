/**
 * Baseline & Anomaly Engine
 *
 * Describes what "normal" looks like for a dimension over a reference
 * window and scores later windows against it.
 *
 * - Population mean/std over one observation per day
 * - Linear-interpolated percentiles (p50..p99)
 * - Percentile rank: share of reference days strictly below the target
 * - Zero-variance baselines fall back to a named sentinel z-score
 */

import { ZERO_VARIANCE_Z_SENTINEL } from "../config/constants.ts";
import { daysBetween, type DayRange } from "../lib/date-utils.ts";
import { maxOf, mean, percentile, percentileRank, round4, stddev } from "../lib/math-utils.ts";
import type { BaselineRow } from "../db/repository.ts";
import type { DimensionKey } from "../schemas/dimension-vector.ts";
import type { DailyObservation } from "./daily-series.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BaselineDistribution {
  dimension: DimensionKey;
  mean: number;
  std: number;
  p50: number;
  p75: number;
  p90: number;
  p95: number;
  p99: number;
  max: number;
  n: number;
}

export interface WindowComparison {
  targetMean: number;
  /** 0-100 */
  percentileRank: number;
  zScore: number;
  aboveP90: boolean;
  aboveP95: boolean;
}

export interface WarningPeak {
  dimension: DimensionKey;
  peakDay: string;
  peakValue: number;
  /** Days from the peak to the event (>= 1) */
  leadDays: number;
  peakPercentileRank: number;
  aboveP90: boolean;
  aboveP95: boolean;
  /** Null when the series has no observation on the event day */
  eventValue: number | null;
  eventPercentileRank: number | null;
  eventAboveP95: boolean | null;
}

// ---------------------------------------------------------------------------
// Baseline
// ---------------------------------------------------------------------------

/**
 * Descriptive statistics over a reference window. Empty input yields an
 * all-zero distribution with n = 0.
 */
export function computeBaseline(
  dimension: DimensionKey,
  observations: readonly DailyObservation[],
): BaselineDistribution {
  const values = observations.map((o) => o.value);
  return {
    dimension,
    mean: mean(values),
    std: stddev(values),
    p50: percentile(values, 0.5),
    p75: percentile(values, 0.75),
    p90: percentile(values, 0.9),
    p95: percentile(values, 0.95),
    p99: percentile(values, 0.99),
    max: maxOf(values),
    n: values.length,
  };
}

export function toBaselineRow(baseline: BaselineDistribution, window: DayRange): BaselineRow {
  return { ...baseline, windowStart: window.start, windowEnd: window.end };
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

/**
 * Standard score against a baseline. When the baseline has no spread the
 * score is `sentinel` for values above the mean and 0 otherwise.
 *
 * @example
 * zScore(10, { mean: 1.4, std: 0.4899 }) // ~17.55
 * zScore(3, { mean: 2, std: 0 }) // 10
 */
export function zScore(
  value: number,
  baseline: Pick<BaselineDistribution, "mean" | "std">,
  sentinel: number = ZERO_VARIANCE_Z_SENTINEL,
): number {
  if (baseline.std === 0) {
    return value > baseline.mean ? sentinel : 0;
  }
  return (value - baseline.mean) / baseline.std;
}

/**
 * Score a target window's mean against the baseline and the reference
 * observations it was built from.
 */
export function compareWindow(
  baseline: BaselineDistribution,
  referenceValues: readonly number[],
  targetValues: readonly number[],
  sentinel: number = ZERO_VARIANCE_Z_SENTINEL,
): WindowComparison {
  const targetMean = mean(targetValues);
  return {
    targetMean,
    percentileRank: percentileRank(referenceValues, targetMean),
    zScore: zScore(targetMean, baseline, sentinel),
    aboveP90: targetMean > baseline.p90,
    aboveP95: targetMean > baseline.p95,
  };
}

/**
 * Highest value in the `warningDays` days before `eventDay`, ranked
 * against the whole series. Null when no observation falls in the
 * warning window.
 */
export function findWarningPeak(
  series: readonly DailyObservation[],
  eventDay: string,
  warningDays: number,
  baseline: BaselineDistribution,
): WarningPeak | null {
  const window = series.filter((o) => {
    const lead = daysBetween(o.day, eventDay);
    return lead >= 1 && lead <= warningDays;
  });
  if (window.length === 0) return null;

  // Earliest day wins a tie
  const peak = window.reduce((best, o) =>
    o.value > best.value || (o.value === best.value && o.day < best.day) ? o : best,
  );
  const all = series.map((o) => o.value);
  const event = series.find((o) => o.day === eventDay);

  return {
    dimension: baseline.dimension,
    peakDay: peak.day,
    peakValue: peak.value,
    leadDays: daysBetween(peak.day, eventDay),
    peakPercentileRank: round4(percentileRank(all, peak.value)),
    aboveP90: peak.value > baseline.p90,
    aboveP95: peak.value > baseline.p95,
    eventValue: event ? event.value : null,
    eventPercentileRank: event ? round4(percentileRank(all, event.value)) : null,
    eventAboveP95: event ? event.value > baseline.p95 : null,
  };
}
