/**
 * Batch Classifier
 *
 * Drives the vector assembler and classification store over a list of
 * text units:
 * - Units already linked are skipped, so an interrupted run can be rerun
 * - Pending units are scored, then persisted in chunks of `batchSize`,
 *   one transaction per chunk and one savepoint per unit
 * - Each unit's write is retried with exponential backoff; a unit that
 *   exhausts its retries is skipped and counted as errored
 * - More than `maxErrors` errored units aborts the run
 * - An AbortSignal stops intake; the in-flight chunk still commits
 */

import type { ClassificationRepository, TextUnit } from "../db/repository.ts";
import { errorMessage, PersistenceFailure } from "../lib/errors.ts";
import { chunk } from "../lib/math-utils.ts";
import type { DimensionVector } from "../schemas/dimension-vector.ts";
import { assembleVector, type AssembleOptions } from "./vector-assembler.ts";
import { classifyUnit } from "./classification-store.ts";
import { PERSISTENCE_POLICY, withRetry, type RetryPolicy } from "./retry-engine.ts";
import {
  logBatchComplete,
  logBatchStart,
  logChunkCommitted,
  logger,
  withContext,
} from "./structured-logger.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BatchContext {
  repository: ClassificationRepository;
}

export interface BatchOptions {
  batchSize: number;
  maxErrors: number;
  assemble: AssembleOptions;
  /** Defaults to PERSISTENCE_POLICY */
  persistencePolicy?: RetryPolicy;
  signal?: AbortSignal;
  /** Process at most this many pending units */
  limit?: number;
  batchId?: string;
}

export interface BatchReport {
  batchId: string;
  processed: number;
  skipped: number;
  errored: number;
  /** Stopped because `errored` exceeded `maxErrors` */
  aborted: boolean;
  /** Stopped because the AbortSignal fired */
  stopped: boolean;
  /** Units whose vector used at least one neutral fallback */
  degraded: number;
  classificationsCreated: number;
  durationMs: number;
}

interface ScoredPending {
  unit: TextUnit;
  vector: DimensionVector;
}

interface ChunkTally {
  processed: number;
  skipped: number;
  errored: number;
  created: number;
  aborted: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function generateBatchId(): string {
  return `batch_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

async function filterPending(
  repo: ClassificationRepository,
  units: readonly TextUnit[],
  batchSize: number,
): Promise<TextUnit[]> {
  const pending: TextUnit[] = [];
  for (const group of chunk(units, batchSize)) {
    const classified = await repo.findClassifiedUnitIds(group.map((unit) => unit.id));
    pending.push(...group.filter((unit) => !classified.has(unit.id)));
  }
  return pending;
}

async function persistChunk(
  repo: ClassificationRepository,
  scored: readonly ScoredPending[],
  policy: RetryPolicy,
  erroredSoFar: number,
  maxErrors: number,
): Promise<ChunkTally> {
  return repo.transaction(async (tx) => {
    const tally: ChunkTally = { processed: 0, skipped: 0, errored: 0, created: 0, aborted: false };

    for (const { unit, vector } of scored) {
      const result = await withContext({ unitId: unit.id }, () =>
        withRetry(() => tx.transaction((savepoint) => classifyUnit(savepoint, unit, vector)), policy, `classify ${unit.id}`),
      );

      if (result.success && result.data) {
        if (result.data.linked) {
          tally.processed++;
          if (result.data.created) tally.created++;
        } else {
          tally.skipped++;
        }
        continue;
      }

      tally.errored++;
      const failure = new PersistenceFailure(
        `unit ${unit.id} not persisted: ${result.lastError ?? "unknown error"}`,
        result.attempts,
        { cause: result.cause },
      );
      logger.error("batch-classifier", "Skipping unit after persistence failure", failure, {
        unitId: unit.id,
        attempts: failure.attempts,
      });

      if (erroredSoFar + tally.errored > maxErrors) {
        tally.aborted = true;
        break;
      }
    }

    return tally;
  });
}

// ---------------------------------------------------------------------------
// Batch Runner
// ---------------------------------------------------------------------------

export async function runClassificationBatch(
  units: readonly TextUnit[],
  context: BatchContext,
  options: BatchOptions,
): Promise<BatchReport> {
  const startMs = Date.now();
  const batchId = options.batchId ?? generateBatchId();
  const policy = options.persistencePolicy ?? PERSISTENCE_POLICY;
  const repo = context.repository;

  const report: BatchReport = {
    batchId,
    processed: 0,
    skipped: 0,
    errored: 0,
    aborted: false,
    stopped: false,
    degraded: 0,
    classificationsCreated: 0,
    durationMs: 0,
  };

  logBatchStart(batchId, units.length, options.assemble.useModels);

  let pending = await filterPending(repo, units, options.batchSize);
  report.skipped = units.length - pending.length;
  if (options.limit !== undefined) pending = pending.slice(0, options.limit);

  const chunks = chunk(pending, options.batchSize);
  for (let index = 0; index < chunks.length; index++) {
    const scored: ScoredPending[] = [];
    for (const unit of chunks[index]) {
      if (options.signal?.aborted) {
        report.stopped = true;
        break;
      }
      const assembled = await assembleVector(unit.body, options.assemble);
      if (assembled.degraded) report.degraded++;
      scored.push({ unit, vector: assembled.vector });
    }

    if (scored.length > 0) {
      try {
        const tally = await persistChunk(repo, scored, policy, report.errored, options.maxErrors);
        report.processed += tally.processed;
        report.skipped += tally.skipped;
        report.errored += tally.errored;
        report.classificationsCreated += tally.created;
        report.aborted = tally.aborted;
        logChunkCommitted(index, tally.processed, tally.errored);
      } catch (err) {
        // The chunk rolled back as a whole; none of its units were written
        report.errored += scored.length;
        logger.error(
          "batch-classifier",
          `Chunk ${index} failed to commit`,
          err instanceof Error ? err : new Error(errorMessage(err)),
          { units: scored.length },
        );
        if (report.errored > options.maxErrors) report.aborted = true;
      }
    }

    if (report.aborted || report.stopped) break;
    if (options.signal?.aborted && index < chunks.length - 1) {
      report.stopped = true;
      break;
    }
  }

  report.durationMs = Date.now() - startMs;
  logBatchComplete({
    batchId,
    processed: report.processed,
    skipped: report.skipped,
    errored: report.errored,
    aborted: report.aborted,
    stopped: report.stopped,
    durationMs: report.durationMs,
  });

  return report;
}
