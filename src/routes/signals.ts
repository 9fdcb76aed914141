/**
 * Signal Read API
 *
 * Serves the derived tables downstream consumers read:
 * - GET /aggregates/:dimension?start&end: daily mean score and unit count
 * - GET /baselines/:dimension?start&end: latest baseline distribution,
 *   and with a target window its mean, percentile rank, z-score and
 *   p90/p95 flags
 * - GET /coherence?start&end&top: coherence samples and the top days
 * - GET /words/:dimension?minScore&maxScore&limit: words in a score band
 * - GET /validation/:dimension?event&window&platform: event window
 *   against its baseline and control windows
 */

import { Hono } from "hono";
import type { PipelineConfig } from "../config/pipeline-config.ts";
import type { ClassificationRepository } from "../db/repository.ts";
import { apiError } from "../lib/errors.ts";
import { addDays, toDayKey } from "../lib/date-utils.ts";
import { parseQuery } from "../middleware/validation.ts";
import { dimensionKeySchema } from "../schemas/dimension-vector.ts";
import {
  baselineQuerySchema,
  coherenceQuerySchema,
  dayRangeQuerySchema,
  eventValidationQuerySchema,
  wordQuerySchema,
} from "../schemas/signal-queries.ts";
import { compareWindow } from "../services/baseline-engine.ts";
import { validateEventWindow } from "../services/cross-corpus-validator.ts";
import { topCoherenceDays } from "../services/event-coherence.ts";
import { getWordsByDimension } from "../services/word-dimensions.ts";

export interface SignalRouteDeps {
  repository: ClassificationRepository;
  config: Pick<PipelineConfig, "eventBaselineDays" | "controls" | "zeroVarianceSentinel">;
}

export function createSignalRoutes({ repository, config }: SignalRouteDeps) {
  const signalRoutes = new Hono();

  // -------------------------------------------------------------------------
  // GET /aggregates/:dimension
  // -------------------------------------------------------------------------

  signalRoutes.get("/aggregates/:dimension", async (c) => {
    const dimension = dimensionKeySchema.safeParse(c.req.param("dimension"));
    if (!dimension.success) return apiError(c, "UNKNOWN_DIMENSION", { dimension: c.req.param("dimension") });

    const query = parseQuery(c, dayRangeQuerySchema);
    if (!query.ok) return query.response;

    const rows = await repository.queryPeriodAggregate(dimension.data, query.data);
    return c.json({
      dimension: dimension.data,
      range: query.data,
      rows: rows.map((row) => ({ date: row.day, meanScore: row.meanScore, count: row.count })),
    });
  });

  // -------------------------------------------------------------------------
  // GET /baselines/:dimension
  // -------------------------------------------------------------------------

  signalRoutes.get("/baselines/:dimension", async (c) => {
    const dimension = dimensionKeySchema.safeParse(c.req.param("dimension"));
    if (!dimension.success) return apiError(c, "UNKNOWN_DIMENSION", { dimension: c.req.param("dimension") });

    const query = parseQuery(c, baselineQuerySchema);
    if (!query.ok) return query.response;

    const baseline = await repository.getLatestBaseline(dimension.data);
    if (!baseline) return apiError(c, "NO_OBSERVATIONS", { dimension: dimension.data });

    const { start, end } = query.data;
    if (start === undefined || end === undefined) return c.json({ baseline });

    const [reference, target] = await Promise.all([
      repository.queryPeriodAggregate(dimension.data, { start: baseline.windowStart, end: baseline.windowEnd }),
      repository.queryPeriodAggregate(dimension.data, { start, end }),
    ]);
    if (target.length === 0) return apiError(c, "NO_OBSERVATIONS", { dimension: dimension.data, start, end });

    const comparison = compareWindow(
      baseline,
      reference.map((row) => row.meanScore),
      target.map((row) => row.meanScore),
      config.zeroVarianceSentinel,
    );
    return c.json({ baseline, target: { start, end, days: target.length }, comparison });
  });

  // -------------------------------------------------------------------------
  // GET /coherence
  // -------------------------------------------------------------------------

  signalRoutes.get("/coherence", async (c) => {
    const query = parseQuery(c, coherenceQuerySchema);
    if (!query.ok) return query.response;

    const { start, end, top } = query.data;
    const samples = await repository.listCoherenceSamples({ start, end });

    return c.json({
      range: { start, end },
      samples: samples.map((s) => ({
        date: s.day,
        coherenceScore: s.coherenceScore,
        asymmetryScore: s.asymmetryScore,
        eventCoherenceIndex: s.eventCoherenceIndex,
      })),
      topDays: topCoherenceDays(samples, top).map((s) => ({
        date: s.day,
        eventCoherenceIndex: s.eventCoherenceIndex,
      })),
    });
  });

  // -------------------------------------------------------------------------
  // GET /words/:dimension
  // -------------------------------------------------------------------------

  signalRoutes.get("/words/:dimension", async (c) => {
    const query = parseQuery(c, wordQuerySchema);
    if (!query.ok) return query.response;

    // Unknown dimensions surface as UnknownDimensionError via the error handler
    const words = await getWordsByDimension(repository, c.req.param("dimension"), query.data);
    return c.json({ dimension: c.req.param("dimension"), words });
  });

  // -------------------------------------------------------------------------
  // GET /validation/:dimension
  // -------------------------------------------------------------------------

  signalRoutes.get("/validation/:dimension", async (c) => {
    const dimension = dimensionKeySchema.safeParse(c.req.param("dimension"));
    if (!dimension.success) return apiError(c, "UNKNOWN_DIMENSION", { dimension: c.req.param("dimension") });

    const query = parseQuery(c, eventValidationQuerySchema);
    if (!query.ok) return query.response;

    const { event, window, platform } = query.data;
    const earliest = Math.max(
      window + config.eventBaselineDays,
      config.controls.maxOffsetDays + window,
    );
    const units = await repository.listScoredUnits(
      { start: addDays(event, -earliest), end: addDays(event, window) },
      platform ? { platform } : undefined,
    );
    if (units.length === 0) return apiError(c, "NO_OBSERVATIONS", { event });

    const scores = units.map((unit) => ({
      day: toDayKey(unit.createdAt),
      value: unit.vector[dimension.data],
    }));
    const [result] = validateEventWindow(new Map([[dimension.data, scores]]), event, {
      windowDays: window,
      baselineDays: config.eventBaselineDays,
      controls: config.controls,
    });

    return c.json({ validation: result });
  });

  return signalRoutes;
}
