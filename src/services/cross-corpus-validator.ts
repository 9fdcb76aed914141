/**
 * Cross-Corpus Validator
 *
 * Tests whether a target set of scores (an event window, or another
 * platform's corpus) differs from a reference set:
 * - Student's t-test with pooled variance, two-sided p-value
 * - Cohen's d over population standard deviations
 * - A non-parametric check against randomly placed control windows
 *
 * Control windows are drawn from a seeded generator so a run is
 * reproducible.
 */

import {
  DEFAULT_CONTROL_MAX_OFFSET_DAYS,
  DEFAULT_CONTROL_MIN_OFFSET_DAYS,
  DEFAULT_CONTROL_SEED,
  DEFAULT_CONTROL_WINDOW_COUNT,
  DEFAULT_EVENT_BASELINE_DAYS,
  EFFECT_SIZE_LARGE,
  EFFECT_SIZE_MEDIUM,
  SIGNIFICANCE_ALPHA,
} from "../config/constants.ts";
import type { ControlWindowOptions } from "../config/pipeline-config.ts";
import { addDays, isWithinRange, type DayRange } from "../lib/date-utils.ts";
import {
  createSeededRandom,
  mean,
  randomInt,
  round4,
  sampleVariance,
  stddev,
  studentTTwoTailedP,
} from "../lib/math-utils.ts";
import type { DimensionKey } from "../schemas/dimension-vector.ts";
import type { DailyObservation } from "./daily-series.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type EffectSize = "small" | "medium" | "large";

export interface CorpusComparison {
  referenceMean: number;
  targetMean: number;
  referenceCount: number;
  targetCount: number;
  /** (target - reference) / |reference| * 100; 0 when the reference mean is 0 */
  percentDifference: number;
  tStatistic: number;
  pValue: number;
  cohensD: number;
  effectSize: EffectSize;
  significant: boolean;
}

export interface ControlCheck {
  /** Null when the target window holds no scores */
  targetMean: number | null;
  /** Means of the control windows that hold scores */
  controlMeans: number[];
  controlMin: number | null;
  controlMax: number | null;
  outsideControlRange: boolean;
}

export interface EventWindowValidation {
  dimension: DimensionKey;
  eventWindow: DayRange;
  baselineWindow: DayRange;
  comparison: CorpusComparison;
  controls: ControlCheck;
}

export interface EventValidationOptions {
  /** Half-width of the event window: [event - w, event + w] */
  windowDays: number;
  baselineDays?: number;
  controls?: ControlWindowOptions;
}

export const DEFAULT_CONTROL_OPTIONS: ControlWindowOptions = {
  count: DEFAULT_CONTROL_WINDOW_COUNT,
  minOffsetDays: DEFAULT_CONTROL_MIN_OFFSET_DAYS,
  maxOffsetDays: DEFAULT_CONTROL_MAX_OFFSET_DAYS,
  seed: DEFAULT_CONTROL_SEED,
};

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

export function classifyEffectSize(d: number): EffectSize {
  const magnitude = Math.abs(round4(d));
  if (magnitude >= EFFECT_SIZE_LARGE) return "large";
  if (magnitude >= EFFECT_SIZE_MEDIUM) return "medium";
  return "small";
}

/**
 * Independent two-sample t statistic with pooled variance. Returns t = 0
 * and p = 1 when either sample has fewer than two values; with zero
 * pooled variance, t is 0 for equal means and ±Infinity otherwise.
 */
export function studentTTest(
  reference: readonly number[],
  target: readonly number[],
): { t: number; p: number; df: number } {
  const n1 = reference.length;
  const n2 = target.length;
  const df = n1 + n2 - 2;
  if (n1 < 2 || n2 < 2) return { t: 0, p: 1, df: Math.max(0, df) };

  const pooled = ((n1 - 1) * sampleVariance(reference) + (n2 - 1) * sampleVariance(target)) / df;
  const delta = mean(target) - mean(reference);
  const standardError = Math.sqrt(pooled * (1 / n1 + 1 / n2));

  if (standardError === 0) {
    if (delta === 0) return { t: 0, p: 1, df };
    return { t: delta > 0 ? Infinity : -Infinity, p: 0, df };
  }

  const t = delta / standardError;
  return { t, p: studentTTwoTailedP(t, df), df };
}

/**
 * (mean(target) - mean(reference)) / sqrt((σref² + σtarget²) / 2),
 * population σ. 0 when both samples have no spread.
 *
 * @example
 * cohensD([0.05, 0.15], [0.09, 0.19]) // 0.8
 */
export function cohensD(reference: readonly number[], target: readonly number[]): number {
  const pooled = Math.sqrt((stddev(reference) ** 2 + stddev(target) ** 2) / 2);
  if (pooled === 0) return 0;
  return (mean(target) - mean(reference)) / pooled;
}

export function compareCorpora(reference: readonly number[], target: readonly number[]): CorpusComparison {
  const referenceMean = mean(reference);
  const targetMean = mean(target);
  const { t, p } = studentTTest(reference, target);
  const d = cohensD(reference, target);

  return {
    referenceMean,
    targetMean,
    referenceCount: reference.length,
    targetCount: target.length,
    percentDifference: referenceMean === 0 ? 0 : ((targetMean - referenceMean) / Math.abs(referenceMean)) * 100,
    tStatistic: t,
    pValue: p,
    cohensD: d,
    effectSize: classifyEffectSize(d),
    significant: p < SIGNIFICANCE_ALPHA,
  };
}

// ---------------------------------------------------------------------------
// Control Windows
// ---------------------------------------------------------------------------

/**
 * Windows of the same shape as the event window ([center - w, center + w]),
 * centered `offset` days before the event, with offset drawn uniformly from
 * [minOffsetDays, maxOffsetDays).
 */
export function sampleControlWindows(
  eventDay: string,
  windowDays: number,
  options: ControlWindowOptions = DEFAULT_CONTROL_OPTIONS,
): DayRange[] {
  const random = createSeededRandom(options.seed);
  const windows: DayRange[] = [];
  for (let i = 0; i < options.count; i++) {
    const center = addDays(eventDay, -randomInt(options.minOffsetDays, options.maxOffsetDays, random));
    windows.push({ start: addDays(center, -windowDays), end: addDays(center, windowDays) });
  }
  return windows;
}

function valuesIn(observations: readonly DailyObservation[], range: DayRange): number[] {
  return observations.filter((o) => isWithinRange(o.day, range)).map((o) => o.value);
}

/**
 * Is the target window's mean outside [min, max] of the control means?
 * Control windows without scores are left out.
 */
export function checkAgainstControls(
  observations: readonly DailyObservation[],
  targetWindow: DayRange,
  controlWindows: readonly DayRange[],
): ControlCheck {
  const target = valuesIn(observations, targetWindow);
  const controlMeans = controlWindows
    .map((window) => valuesIn(observations, window))
    .filter((values) => values.length > 0)
    .map((values) => mean(values));

  const targetMean = target.length > 0 ? mean(target) : null;
  const controlMin = controlMeans.length > 0 ? Math.min(...controlMeans) : null;
  const controlMax = controlMeans.length > 0 ? Math.max(...controlMeans) : null;
  const outsideControlRange =
    targetMean !== null &&
    controlMin !== null &&
    controlMax !== null &&
    (targetMean < controlMin || targetMean > controlMax);

  return { targetMean, controlMeans, controlMin, controlMax, outsideControlRange };
}

/**
 * Event window ([event - w, event + w]) against the baseline immediately
 * before it and against control windows, per dimension.
 *
 * `scoresByDimension` holds one entry per scored unit, so a day may repeat.
 */
export function validateEventWindow(
  scoresByDimension: ReadonlyMap<DimensionKey, readonly DailyObservation[]>,
  eventDay: string,
  options: EventValidationOptions,
): EventWindowValidation[] {
  const baselineDays = options.baselineDays ?? DEFAULT_EVENT_BASELINE_DAYS;
  const eventWindow: DayRange = {
    start: addDays(eventDay, -options.windowDays),
    end: addDays(eventDay, options.windowDays),
  };
  const baselineWindow: DayRange = {
    start: addDays(eventWindow.start, -baselineDays),
    end: addDays(eventWindow.start, -1),
  };
  const controlWindows = sampleControlWindows(eventDay, options.windowDays, options.controls);

  return [...scoresByDimension].map(([dimension, scores]) => ({
    dimension,
    eventWindow,
    baselineWindow,
    comparison: compareCorpora(valuesIn(scores, baselineWindow), valuesIn(scores, eventWindow)),
    controls: checkAgainstControls(scores, eventWindow, controlWindows),
  }));
}
