/**
 * Analysis Runner
 *
 * Rebuilds every derived table for a date range, in order:
 * 1. Period aggregates from the classification links
 * 2. One baseline per dimension over the range
 * 3. Coherence samples over the aligned daily series of the dimensions
 *    the run actually scores (model dimensions only when models are on)
 *
 * Each step overwrites its own rows, so rerunning a range is safe.
 */

import type { PipelineConfig } from "../config/pipeline-config.ts";
import type { ClassificationRepository, UnitFilter } from "../db/repository.ts";
import type { DayRange } from "../lib/date-utils.ts";
import { DIMENSION_KEYS, scoredDimensions, type DimensionKey } from "../schemas/dimension-vector.ts";
import { computeBaseline, toBaselineRow, type BaselineDistribution } from "./baseline-engine.ts";
import { alignSeries, observationsFromAggregates, type DailyObservation } from "./daily-series.ts";
import { computeEventCoherence, toCoherenceRow, topCoherenceDays, type CoherenceSample } from "./event-coherence.ts";
import { refreshPeriodAggregates } from "./period-aggregates.ts";
import { logger, timeOperation } from "./structured-logger.ts";

export interface AnalysisReport {
  range: DayRange;
  aggregateRows: number;
  baselines: BaselineDistribution[];
  samples: CoherenceSample[];
  eventRegimeDays: string[];
  topDays: CoherenceSample[];
}

export async function loadDimensionSeries(
  repo: ClassificationRepository,
  range: DayRange,
  dimensions: readonly DimensionKey[] = DIMENSION_KEYS,
): Promise<Map<DimensionKey, DailyObservation[]>> {
  const series = new Map<DimensionKey, DailyObservation[]>();
  for (const dimension of dimensions) {
    series.set(dimension, observationsFromAggregates(await repo.queryPeriodAggregate(dimension, range)));
  }
  return series;
}

export async function refreshBaselines(
  repo: ClassificationRepository,
  range: DayRange,
  series: ReadonlyMap<DimensionKey, readonly DailyObservation[]>,
): Promise<BaselineDistribution[]> {
  const baselines = [...series].map(([dimension, observations]) => computeBaseline(dimension, observations));
  await repo.transaction(async (tx) => {
    for (const baseline of baselines) {
      await tx.saveBaseline(toBaselineRow(baseline, range));
    }
  });
  return baselines;
}

export async function refreshCoherence(
  repo: ClassificationRepository,
  range: DayRange,
  series: ReadonlyMap<DimensionKey, readonly DailyObservation[]>,
  config: PipelineConfig,
): Promise<CoherenceSample[]> {
  const scored = new Set(scoredDimensions(config.useModels));
  const coherenceSeries = new Map([...series].filter(([dimension]) => scored.has(dimension)));
  const samples = computeEventCoherence(alignSeries(coherenceSeries, range), {
    weights: config.weights,
    syncThresholdK: config.syncThresholdK,
    asymmetryWindowDays: config.asymmetryWindowDays,
    smoothingWindowDays: config.smoothingWindowDays,
    eventThreshold: config.eventThreshold,
  });
  await repo.transaction((tx) => tx.replaceCoherenceSamples(range, samples.map(toCoherenceRow)));
  return samples;
}

export async function analyzeRange(
  repo: ClassificationRepository,
  range: DayRange,
  config: PipelineConfig,
  options: { filter?: UnitFilter; topDays?: number } = {},
): Promise<AnalysisReport> {
  const { result } = await timeOperation("analysis-runner", `analyze ${range.start}..${range.end}`, async () => {
    const aggregates = await refreshPeriodAggregates(repo, range, options.filter);
    const series = await loadDimensionSeries(repo, range);
    const baselines = await refreshBaselines(repo, range, series);
    const samples = await refreshCoherence(repo, range, series, config);
    const eventRegimeDays = samples.filter((s) => s.isEventRegime).map((s) => s.day);

    logger.info("analysis-runner", "Derived tables rebuilt", {
      aggregateRows: aggregates.length,
      baselines: baselines.length,
      samples: samples.length,
      eventRegimeDays: eventRegimeDays.length,
    });

    return {
      range,
      aggregateRows: aggregates.length,
      baselines,
      samples,
      eventRegimeDays,
      topDays: topCoherenceDays(samples, options.topDays ?? 10),
    };
  });
  return result;
}
