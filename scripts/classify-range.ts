#!/usr/bin/env npx tsx
/**
 * Classify Range
 *
 * Scores every text unit created in a date range and links it to its
 * deduplicated classification. Units already linked are skipped, so an
 * interrupted run can simply be started again.
 *
 * Usage:
 *   npx tsx scripts/classify-range.ts --start 2024-06-01 --end 2024-06-30
 *   npx tsx scripts/classify-range.ts --start 2024-06-01 --end 2024-06-30 --models --limit 500
 *   npx tsx scripts/classify-range.ts --start 2024-06-01 --end 2024-06-30 --platform forum
 *
 * Ctrl-C stops intake; the chunk in flight still commits.
 */

import { z } from "zod";
import { loadEnv } from "../src/config/env.ts";
import { parseArgs } from "../src/lib/cli-args.ts";
import { errorMessage } from "../src/lib/errors.ts";
import { dayKeySchema } from "../src/schemas/signal-queries.ts";
import { runClassificationBatch } from "../src/services/batch-classifier.ts";
import { assembleOptionsFor, openPipelineContext, persistencePolicyFor } from "../src/services/pipeline-context.ts";
import { getRetryMetrics } from "../src/services/retry-engine.ts";
import { getLoggerStats, getRecentLogs, logger } from "../src/services/structured-logger.ts";

const argsSchema = z
  .object({
    start: dayKeySchema,
    end: dayKeySchema,
    platform: z.string().min(1).optional(),
    limit: z.coerce.number().int().positive().optional(),
    models: z.literal("true").optional(),
  })
  .refine((a) => a.start <= a.end, { message: "start must not be after end", path: ["start"] });

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), argsSchema);
  const env = loadEnv();
  const context = openPipelineContext(env, args.models ? { useModels: true } : {});

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("classify-range", "Interrupt received; finishing the current chunk");
    controller.abort();
  });

  try {
    const range = { start: args.start, end: args.end };
    const units = await context.repository.listTextUnits(range, args.platform ? { platform: args.platform } : undefined);
    const { config } = context;

    const report = await runClassificationBatch(units, context, {
      batchSize: config.batchSize,
      maxErrors: config.maxErrors,
      assemble: assembleOptionsFor(context),
      persistencePolicy: persistencePolicyFor(config),
      signal: controller.signal,
      limit: args.limit,
    });

    const { totalRetriesUsed, retriesByPolicy } = getRetryMetrics();
    const recentErrors = getRecentLogs({ level: "ERROR", limit: 10 }).map((entry) => ({
      unitId: entry.unitId,
      message: entry.message,
      error: entry.error?.message,
    }));
    console.log(
      JSON.stringify(
        { ...report, retries: { totalRetriesUsed, retriesByPolicy }, counters: getLoggerStats().counters, recentErrors },
        null,
        2,
      ),
    );
    if (report.aborted) process.exitCode = 2;
  } finally {
    await context.close();
  }
}

main().catch((err: unknown) => {
  logger.fatal("classify-range", "Run failed", new Error(errorMessage(err)));
  process.exitCode = 1;
});
