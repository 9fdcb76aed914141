/**
 * Daily series helpers shared by the statistics services.
 *
 * A dimension's history is a list of (day, value) observations. The
 * synchronization, asymmetry and coherence computations need every
 * dimension laid out on the same calendar, with gaps as null.
 */

import type { PeriodAggregateRow } from "../db/repository.ts";
import { enumerateDays, type DayRange } from "../lib/date-utils.ts";
import type { DimensionKey } from "../schemas/dimension-vector.ts";

export interface DailyObservation {
  day: string;
  value: number;
}

export interface AlignedSeries {
  /** Every calendar day in the range, ascending */
  days: string[];
  /** One value per entry of `days`; null where the dimension has no data */
  values: Map<DimensionKey, Array<number | null>>;
}

export function observationsFromAggregates(rows: readonly PeriodAggregateRow[]): DailyObservation[] {
  return rows.map((row) => ({ day: row.day, value: row.meanScore }));
}

/**
 * Lay each dimension's observations on the full calendar of `range`.
 * Observations outside the range are dropped.
 */
export function alignSeries(
  byDimension: ReadonlyMap<DimensionKey, readonly DailyObservation[]>,
  range: DayRange,
): AlignedSeries {
  const days = enumerateDays(range.start, range.end);
  const position = new Map(days.map((day, index) => [day, index]));
  const values = new Map<DimensionKey, Array<number | null>>();

  for (const [dimension, observations] of byDimension) {
    const series: Array<number | null> = days.map(() => null);
    for (const observation of observations) {
      const index = position.get(observation.day);
      if (index !== undefined) series[index] = observation.value;
    }
    values.set(dimension, series);
  }

  return { days, values };
}

export function definedValues(values: ReadonlyArray<number | null>): number[] {
  return values.filter((v): v is number => v !== null);
}
