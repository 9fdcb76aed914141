/**
 * Derivative & Synchronization Signals
 *
 * A day is "synchronized" when many dimensions move sharply at once. Sharp
 * means the day's first or second derivative exceeds k sample standard
 * deviations of that derivative over the whole series.
 */

import { DEFAULT_SYNC_THRESHOLD_K } from "../config/constants.ts";
import { diff, sampleStddev } from "../lib/math-utils.ts";
import type { DimensionKey } from "../schemas/dimension-vector.ts";
import { definedValues } from "./daily-series.ts";

export interface Derivatives {
  /** Day-over-day delta; null on day 0 and next to gaps */
  first: Array<number | null>;
  /** Delta of the delta */
  second: Array<number | null>;
}

export interface SyncPoint {
  index: number;
  firstExceedances: number;
  secondExceedances: number;
  /** (firstExceedances + secondExceedances) / (2 * dimensions), in [0, 1] */
  score: number;
}

/**
 * @example
 * computeDerivatives([1, 3, 6]) // { first: [null, 2, 3], second: [null, null, 1] }
 */
export function computeDerivatives(series: ReadonlyArray<number | null>): Derivatives {
  const first = diff(series);
  return { first, second: diff(first) };
}

/**
 * Per-index flags for |x| > k * sampleStd(defined x). A series with fewer
 * than two defined values has no spread estimate and flags nothing.
 */
function exceedances(values: ReadonlyArray<number | null>, k: number): boolean[] {
  const defined = definedValues(values);
  if (defined.length < 2) return values.map(() => false);
  const threshold = k * sampleStddev(defined);
  return values.map((v) => v !== null && Math.abs(v) > threshold);
}

/**
 * Synchronization score per day. Every series must have the same length.
 */
export function computeSynchronization(
  seriesByDimension: ReadonlyMap<DimensionKey, ReadonlyArray<number | null>>,
  k: number = DEFAULT_SYNC_THRESHOLD_K,
): SyncPoint[] {
  const all = [...seriesByDimension.values()];
  if (all.length === 0) return [];

  const length = all[0].length;
  if (all.some((series) => series.length !== length)) {
    throw new Error("synchronization requires series of equal length");
  }

  const firstFlags: boolean[][] = [];
  const secondFlags: boolean[][] = [];
  for (const series of all) {
    const { first, second } = computeDerivatives(series);
    firstFlags.push(exceedances(first, k));
    secondFlags.push(exceedances(second, k));
  }

  const dimensions = all.length;
  const points: SyncPoint[] = [];
  for (let index = 0; index < length; index++) {
    const firstExceedances = firstFlags.filter((flags) => flags[index]).length;
    const secondExceedances = secondFlags.filter((flags) => flags[index]).length;
    points.push({
      index,
      firstExceedances,
      secondExceedances,
      score: (firstExceedances + secondExceedances) / (2 * dimensions),
    });
  }
  return points;
}
