/**
 * Period Aggregates
 *
 * Per-day, per-dimension mean scores and unit counts. The cached table is
 * derived: `refreshPeriodAggregates` rebuilds it from the classification
 * links, and `verifyPeriodAggregates` replays the computation to find
 * drifted rows.
 */

import type { ClassificationRepository, PeriodAggregateRow, ScoredUnit, UnitFilter } from "../db/repository.ts";
import { AGGREGATE_TOLERANCE } from "../config/constants.ts";
import { toDayKey, type DayRange } from "../lib/date-utils.ts";
import { groupBy, mean } from "../lib/math-utils.ts";
import { DIMENSION_KEYS, type DimensionKey } from "../schemas/dimension-vector.ts";
import { logger } from "./structured-logger.ts";

export interface AggregateDrift {
  day: string;
  dimension: DimensionKey;
  cached: PeriodAggregateRow | null;
  expected: PeriodAggregateRow | null;
}

/**
 * Group scored units by UTC day and average each dimension.
 * Rows are ordered by day, then by dimension order.
 */
export function computePeriodAggregates(
  units: readonly Pick<ScoredUnit, "createdAt" | "vector">[],
  dimensions: readonly DimensionKey[] = DIMENSION_KEYS,
): PeriodAggregateRow[] {
  const byDay = groupBy(units, (unit) => toDayKey(unit.createdAt));
  const days = [...byDay.keys()].sort();

  return days.flatMap((day) => {
    const dayUnits = byDay.get(day) ?? [];
    return dimensions.map((dimension) => ({
      day,
      dimension,
      meanScore: mean(dayUnits.map((unit) => unit.vector[dimension])),
      count: dayUnits.length,
    }));
  });
}

/**
 * Recompute aggregates for the range and overwrite the cache.
 */
export async function refreshPeriodAggregates(
  repo: ClassificationRepository,
  range: DayRange,
  filter?: UnitFilter,
): Promise<PeriodAggregateRow[]> {
  const units = await repo.listScoredUnits(range, filter);
  const rows = computePeriodAggregates(units);
  await repo.transaction((tx) => tx.replacePeriodAggregates(range, rows));
  logger.info("period-aggregates", "Refreshed period aggregates", {
    start: range.start,
    end: range.end,
    units: units.length,
    rows: rows.length,
  });
  return rows;
}

/**
 * Compare the cache against a fresh computation. Returns every
 * (day, dimension) whose mean or count differs, or which exists on one
 * side only.
 */
export async function verifyPeriodAggregates(
  repo: ClassificationRepository,
  range: DayRange,
  tolerance: number = AGGREGATE_TOLERANCE,
): Promise<AggregateDrift[]> {
  const expected = computePeriodAggregates(await repo.listScoredUnits(range));
  const expectedByKey = new Map(expected.map((row) => [`${row.day}|${row.dimension}`, row]));
  const drift: AggregateDrift[] = [];

  for (const dimension of DIMENSION_KEYS) {
    const cached = await repo.queryPeriodAggregate(dimension, range);
    const seen = new Set<string>();

    for (const row of cached) {
      const key = `${row.day}|${dimension}`;
      seen.add(key);
      const want = expectedByKey.get(key) ?? null;
      if (!want || want.count !== row.count || Math.abs(want.meanScore - row.meanScore) > tolerance) {
        drift.push({ day: row.day, dimension, cached: row, expected: want });
      }
    }

    for (const row of expected) {
      if (row.dimension === dimension && !seen.has(`${row.day}|${dimension}`)) {
        drift.push({ day: row.day, dimension, cached: null, expected: row });
      }
    }
  }

  if (drift.length > 0) {
    logger.warn("period-aggregates", "Cached aggregates drifted from recomputation", {
      rows: drift.length,
    });
  }
  return drift;
}
