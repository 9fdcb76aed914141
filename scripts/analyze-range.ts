#!/usr/bin/env npx tsx
/**
 * Analyze Range
 *
 * Rebuilds period aggregates, baselines and coherence samples for a date
 * range, then prints the event-regime days and the top coherence days.
 *
 * Usage:
 *   npx tsx scripts/analyze-range.ts --start 2024-03-01 --end 2024-08-31
 *   npx tsx scripts/analyze-range.ts --start 2024-03-01 --end 2024-08-31 --event 2024-06-12 --window 3
 *   npx tsx scripts/analyze-range.ts --start 2024-03-01 --end 2024-08-31 --verify
 *
 * With --event, each dimension's event window is also tested against the
 * baseline before it and against seeded control windows, and the highest
 * day of the warning window before the event is reported.
 */

import { z } from "zod";
import { loadEnv } from "../src/config/env.ts";
import { parseArgs } from "../src/lib/cli-args.ts";
import { toDayKey } from "../src/lib/date-utils.ts";
import { errorMessage } from "../src/lib/errors.ts";
import { round4 } from "../src/lib/math-utils.ts";
import { DIMENSION_KEYS, type DimensionKey } from "../src/schemas/dimension-vector.ts";
import { dayKeySchema } from "../src/schemas/signal-queries.ts";
import { analyzeRange, loadDimensionSeries } from "../src/services/analysis-runner.ts";
import { findWarningPeak } from "../src/services/baseline-engine.ts";
import { validateEventWindow } from "../src/services/cross-corpus-validator.ts";
import type { DailyObservation } from "../src/services/daily-series.ts";
import { verifyPeriodAggregates } from "../src/services/period-aggregates.ts";
import { openPipelineContext } from "../src/services/pipeline-context.ts";
import { logger } from "../src/services/structured-logger.ts";

const argsSchema = z
  .object({
    start: dayKeySchema,
    end: dayKeySchema,
    event: dayKeySchema.optional(),
    window: z.coerce.number().int().min(0).default(3),
    platform: z.string().min(1).optional(),
    top: z.coerce.number().int().positive().default(10),
    verify: z.literal("true").optional(),
  })
  .refine((a) => a.start <= a.end, { message: "start must not be after end", path: ["start"] });

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), argsSchema);
  const context = openPipelineContext(loadEnv());
  const { config, repository } = context;
  const range = { start: args.start, end: args.end };
  const filter = args.platform ? { platform: args.platform } : undefined;

  try {
    if (args.verify) {
      const drift = await verifyPeriodAggregates(repository, range);
      console.log(JSON.stringify({ driftedRows: drift.length, drift: drift.slice(0, 20) }, null, 2));
      if (drift.length > 0) process.exitCode = 3;
      return;
    }

    const report = await analyzeRange(repository, range, config, { filter, topDays: args.top });
    console.log(`\nEvent-regime days (${report.eventRegimeDays.length}): ${report.eventRegimeDays.join(", ") || "none"}`);
    console.log("Top coherence days:");
    for (const sample of report.topDays) {
      console.log(`  ${sample.day}  index=${round4(sample.eventCoherenceIndex ?? 0)}  sync=${round4(sample.coherenceScore)}`);
    }

    if (!args.event) return;

    const series = await loadDimensionSeries(repository, range);
    const scored = await repository.listScoredUnits(range, filter);
    const scores = new Map<DimensionKey, DailyObservation[]>(
      DIMENSION_KEYS.map((dimension) => [
        dimension,
        scored.map((unit) => ({ day: toDayKey(unit.createdAt), value: unit.vector[dimension] })),
      ]),
    );

    const validations = validateEventWindow(scores, args.event, {
      windowDays: args.window,
      baselineDays: config.eventBaselineDays,
      controls: config.controls,
    });

    console.log(`\nEvent ${args.event} (±${args.window} days):`);
    for (const v of validations) {
      const baseline = report.baselines.find((b) => b.dimension === v.dimension);
      const peak = baseline
        ? findWarningPeak(series.get(v.dimension) ?? [], args.event, config.warningWindowDays, baseline)
        : null;
      console.log(
        `  ${v.dimension.padEnd(18)} Δ%=${round4(v.comparison.percentDifference)} p=${round4(v.comparison.pValue)} ` +
          `d=${round4(v.comparison.cohensD)} (${v.comparison.effectSize}) ` +
          `controls=${v.controls.outsideControlRange ? "OUTSIDE" : "inside"}` +
          (peak ? ` peak=${peak.peakDay} lead=${peak.leadDays}d rank=${peak.peakPercentileRank}` : ""),
      );
    }
  } finally {
    await context.close();
  }
}

main().catch((err: unknown) => {
  logger.fatal("analyze-range", "Run failed", new Error(errorMessage(err)));
  process.exitCode = 1;
});
