/**
 * Integration tests for the Signal Read API
 *
 * Tests all endpoints over an in-memory store:
 * - GET /health: store round-trip status
 * - GET /api/v1/aggregates/:dimension: daily rows in a range
 * - GET /api/v1/baselines/:dimension: latest baseline, optionally scored
 *   against a target window
 * - GET /api/v1/coherence: samples and top days
 * - GET /api/v1/words/:dimension: words in a score band
 * - GET /api/v1/validation/:dimension: event window validation
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createApp } from "../app.ts";
import { classifyUnit } from "../services/classification-store.ts";
import { buildDimensionVector } from "../schemas/dimension-vector.ts";
import { addDays } from "../lib/date-utils.ts";
import { InMemoryClassificationRepository, makeUnit } from "../services/__tests__/helpers/in-memory-repository.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CONFIG = {
  eventBaselineDays: 30,
  controls: { count: 5, minOffsetDays: 45, maxOffsetDays: 150, seed: 42 },
  zeroVarianceSentinel: 7,
};

let repo: InMemoryClassificationRepository;
let app: ReturnType<typeof createApp>;

function get(path: string): Promise<Response> {
  return Promise.resolve(app.request(path));
}

async function seedUnit(id: string, day: string, novelMeme: number, platform = "forum"): Promise<void> {
  const unit = makeUnit(id, "signal text", `${day}T12:00:00Z`, platform);
  repo.addUnits([unit]);
  await classifyUnit(repo, unit, buildDimensionVector({ novelMeme }));
}

beforeEach(() => {
  repo = new InMemoryClassificationRepository();
  app = createApp({ repository: repo, config: CONFIG, ping: async () => {} });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("GET /health", () => {
  it("should report ok when the store answers", async () => {
    const res = await get("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", database: { connected: true } });
  });

  it("should report degraded when the store does not answer", async () => {
    app = createApp({
      repository: repo,
      config: CONFIG,
      ping: async () => {
        throw new Error("Connection terminated");
      },
    });

    const res = await get("/health");
    expect(await res.json()).toMatchObject({
      status: "degraded",
      database: { connected: false, error: "Connection terminated" },
    });
  });
});

describe("GET /api/v1/aggregates/:dimension", () => {
  it("should return daily rows in the range", async () => {
    repo.setAggregate({ day: "2025-01-02", dimension: "novelMeme", meanScore: 0.25, count: 4 });
    repo.setAggregate({ day: "2025-02-02", dimension: "novelMeme", meanScore: 0.5, count: 1 });

    const res = await get("/api/v1/aggregates/novelMeme?start=2025-01-01&end=2025-01-31");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      dimension: "novelMeme",
      range: { start: "2025-01-01", end: "2025-01-31" },
      rows: [{ date: "2025-01-02", meanScore: 0.25, count: 4 }],
    });
  });

  it("should reject an unknown dimension", async () => {
    const res = await get("/api/v1/aggregates/vibes?start=2025-01-01&end=2025-01-31");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "unknown_dimension",
      code: "unknown_dimension",
      details: { dimension: "vibes" },
    });
  });

  it("should reject an inverted range", async () => {
    const res = await get("/api/v1/aggregates/novelMeme?start=2025-02-01&end=2025-01-01");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: "Invalid query parameters",
      code: "validation_failed",
      details: { issues: [{ path: "start", message: "start must not be after end" }] },
    });
  });

  it("should reject a malformed date", async () => {
    const res = await get("/api/v1/aggregates/novelMeme?start=yesterday&end=2025-01-01");
    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/baselines/:dimension", () => {
  it("should return 404 before any baseline exists", async () => {
    const res = await get("/api/v1/baselines/sacredProfane");
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: "no_observations" });
  });

  it("should return the latest baseline", async () => {
    await repo.saveBaseline({
      dimension: "sacredProfane",
      windowStart: "2025-01-01",
      windowEnd: "2025-01-31",
      mean: -0.1,
      std: 0.05,
      p50: -0.1,
      p75: -0.05,
      p90: 0,
      p95: 0.02,
      p99: 0.04,
      max: 0.05,
      n: 31,
    });

    const res = await get("/api/v1/baselines/sacredProfane");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ baseline: { dimension: "sacredProfane", mean: -0.1, n: 31 } });
  });

  describe("with a target window", () => {
    beforeEach(async () => {
      await repo.saveBaseline({
        dimension: "sacredProfane",
        windowStart: "2025-01-01",
        windowEnd: "2025-01-04",
        mean: 0.2,
        std: 0,
        p50: 0.2,
        p75: 0.2,
        p90: 0.2,
        p95: 0.2,
        p99: 0.2,
        max: 0.2,
        n: 4,
      });
      for (const day of ["2025-01-01", "2025-01-02", "2025-01-03", "2025-01-04"]) {
        repo.setAggregate({ day, dimension: "sacredProfane", meanScore: 0.2, count: 1 });
      }
      repo.setAggregate({ day: "2025-02-01", dimension: "sacredProfane", meanScore: 0.5, count: 2 });
      repo.setAggregate({ day: "2025-02-02", dimension: "sacredProfane", meanScore: 0.75, count: 3 });
    });

    it("should score the window mean with the configured zero-variance sentinel", async () => {
      const res = await get("/api/v1/baselines/sacredProfane?start=2025-02-01&end=2025-02-02");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        baseline: { windowStart: "2025-01-01", windowEnd: "2025-01-04" },
        target: { start: "2025-02-01", end: "2025-02-02", days: 2 },
        comparison: { targetMean: 0.625, percentileRank: 100, zScore: 7, aboveP90: true, aboveP95: true },
      });
    });

    it("should not flag a window matching the baseline", async () => {
      const res = await get("/api/v1/baselines/sacredProfane?start=2025-01-02&end=2025-01-03");

      expect(await res.json()).toMatchObject({
        comparison: { targetMean: 0.2, percentileRank: 0, zScore: 0, aboveP90: false, aboveP95: false },
      });
    });

    it("should return 404 when the window has no aggregates", async () => {
      const res = await get("/api/v1/baselines/sacredProfane?start=2025-03-01&end=2025-03-31");
      expect(res.status).toBe(404);
    });

    it("should reject a window without an end", async () => {
      const res = await get("/api/v1/baselines/sacredProfane?start=2025-02-01");

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        code: "validation_failed",
        details: { issues: [{ path: "start", message: "start and end must be given together" }] },
      });
    });
  });
});

describe("GET /api/v1/coherence", () => {
  beforeEach(async () => {
    await repo.replaceCoherenceSamples({ start: "2025-01-01", end: "2025-01-03" }, [
      { day: "2025-01-01", coherenceScore: 0, asymmetryScore: null, eventCoherenceIndex: null },
      { day: "2025-01-02", coherenceScore: 0.5, asymmetryScore: 1, eventCoherenceIndex: 0.6 },
      { day: "2025-01-03", coherenceScore: 0.25, asymmetryScore: 0, eventCoherenceIndex: 0.2 },
    ]);
  });

  it("should return samples and the top days", async () => {
    const res = await get("/api/v1/coherence?start=2025-01-01&end=2025-01-03&top=1");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      range: { start: "2025-01-01", end: "2025-01-03" },
      samples: [
        { date: "2025-01-01", coherenceScore: 0, asymmetryScore: null, eventCoherenceIndex: null },
        { date: "2025-01-02", coherenceScore: 0.5, asymmetryScore: 1, eventCoherenceIndex: 0.6 },
        { date: "2025-01-03", coherenceScore: 0.25, asymmetryScore: 0, eventCoherenceIndex: 0.2 },
      ],
      topDays: [{ date: "2025-01-02", eventCoherenceIndex: 0.6 }],
    });
  });

  it("should reject top above 100", async () => {
    const res = await get("/api/v1/coherence?start=2025-01-01&end=2025-01-03&top=101");
    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/words/:dimension", () => {
  it("should return words in the score band", async () => {
    await seedUnit("u1", "2025-01-05", 0.9);
    await seedUnit("u2", "2025-01-05", 0.1);

    const res = await get("/api/v1/words/novelMeme?minScore=0.5");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      dimension: "novelMeme",
      words: [
        { word: "signal", frequency: 1, meanScore: 0.9 },
        { word: "text", frequency: 1, meanScore: 0.9 },
      ],
    });
  });

  it("should map an unknown dimension through the error handler", async () => {
    const res = await get("/api/v1/words/vibes");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Unknown dimension: vibes", code: "unknown_dimension", status: 400 });
  });

  it("should reject an inverted score band", async () => {
    const res = await get("/api/v1/words/novelMeme?minScore=0.8&maxScore=0.2");
    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/validation/:dimension", () => {
  it("should return 404 when no units are scored", async () => {
    const res = await get("/api/v1/validation/novelMeme?event=2025-03-31");
    expect(res.status).toBe(404);
  });

  it("should validate the event window", async () => {
    for (let i = 0; i < 10; i++) await seedUnit(`b${i}`, addDays("2025-03-01", i), i % 2 === 0 ? 0.1 : 0.2);
    await seedUnit("e1", "2025-03-30", 0.5);
    await seedUnit("e2", "2025-03-31", 0.6);
    await seedUnit("e3", "2025-04-01", 0.7);
    await seedUnit("other", "2025-03-31", 0, "chat");

    const res = await get("/api/v1/validation/novelMeme?event=2025-03-31&window=1&platform=forum");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      validation: {
        dimension: "novelMeme",
        eventWindow: { start: "2025-03-30", end: "2025-04-01" },
        baselineWindow: { start: "2025-02-28", end: "2025-03-29" },
        comparison: { referenceCount: 10, targetCount: 3, significant: true, effectSize: "large" },
        controls: { controlMeans: [], outsideControlRange: false },
      },
    });
  });
});

describe("unknown routes", () => {
  it("should return a structured 404", async () => {
    const res = await get("/api/v2/nothing");
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: "not_found", status: 404 });
  });
});
