/**
 * Pre/post asymmetry.
 *
 * For a candidate day with value v, the surrounding ±W days are compared to
 * v: a spike stands above both its run-up and its aftermath. The two dips
 * are scaled by the spike's height over the dimension's long-run mean and
 * averaged across dimensions.
 */

import { DEFAULT_ASYMMETRY_WINDOW_DAYS } from "../config/constants.ts";
import { mean } from "../lib/math-utils.ts";
import type { DimensionKey } from "../schemas/dimension-vector.ts";
import { definedValues } from "./daily-series.ts";

/**
 * Asymmetry of one dimension at `index`, or null when the dimension does
 * not contribute there (gap at the day, empty side, or zero height).
 */
export function dimensionAsymmetry(
  series: ReadonlyArray<number | null>,
  index: number,
  windowDays: number,
  longRunMean: number,
): number | null {
  const value = series[index];
  if (value === null || value === undefined) return null;

  const before = definedValues(series.slice(index - windowDays, index));
  const after = definedValues(series.slice(index + 1, index + 1 + windowDays));
  if (before.length === 0 || after.length === 0) return null;

  const height = Math.abs(value - longRunMean);
  if (height === 0) return null;

  const preDip = Math.max(0, value - mean(before));
  const postDip = Math.max(0, value - mean(after));
  return (preDip + postDip) / height;
}

/**
 * Asymmetry per day across dimensions. Days without a full window on both
 * sides, or where no dimension contributes, are null.
 */
export function computeAsymmetry(
  seriesByDimension: ReadonlyMap<DimensionKey, ReadonlyArray<number | null>>,
  windowDays: number = DEFAULT_ASYMMETRY_WINDOW_DAYS,
): Array<number | null> {
  const all = [...seriesByDimension.values()];
  if (all.length === 0) return [];
  const length = all[0].length;
  const longRunMeans = all.map((series) => mean(definedValues(series)));

  const result: Array<number | null> = [];
  for (let index = 0; index < length; index++) {
    if (index < windowDays || index + windowDays >= length) {
      result.push(null);
      continue;
    }
    const contributions = all
      .map((series, d) => dimensionAsymmetry(series, index, windowDays, longRunMeans[d]))
      .filter((v): v is number => v !== null);
    result.push(contributions.length > 0 ? mean(contributions) : null);
  }
  return result;
}
