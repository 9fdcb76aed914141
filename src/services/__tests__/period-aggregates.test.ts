/**
 * Period Aggregate Tests
 *
 * 1. Per-day means and counts grouped by UTC day
 * 2. Refresh overwrites the cached rows for the range
 * 3. Verification reports changed, stale and missing rows
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  computePeriodAggregates,
  refreshPeriodAggregates,
  verifyPeriodAggregates,
} from "../period-aggregates.ts";
import { classifyUnit } from "../classification-store.ts";
import { buildDimensionVector } from "../../schemas/dimension-vector.ts";
import { InMemoryClassificationRepository, makeUnit } from "./helpers/in-memory-repository.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const RANGE = { start: "2025-04-01", end: "2025-04-30" };

let repo: InMemoryClassificationRepository;

async function seed(id: string, createdAt: string, certainty: number): Promise<void> {
  const unit = makeUnit(id, "text", createdAt);
  repo.addUnits([unit]);
  await classifyUnit(repo, unit, buildDimensionVector({ certaintyCollapse: certainty }));
}

beforeEach(() => {
  repo = new InMemoryClassificationRepository();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("computePeriodAggregates", () => {
  it("should average each dimension per UTC day", () => {
    const rows = computePeriodAggregates(
      [
        { createdAt: new Date("2025-04-02T23:30:00Z"), vector: buildDimensionVector({ certaintyCollapse: 0.25 }) },
        { createdAt: new Date("2025-04-02T01:00:00Z"), vector: buildDimensionVector({ certaintyCollapse: 0.75 }) },
        { createdAt: new Date("2025-04-01T12:00:00Z"), vector: buildDimensionVector({ certaintyCollapse: -1 }) },
      ],
      ["certaintyCollapse", "temporalProximity"],
    );

    expect(rows).toEqual([
      { day: "2025-04-01", dimension: "certaintyCollapse", meanScore: -1, count: 1 },
      { day: "2025-04-01", dimension: "temporalProximity", meanScore: 0.5, count: 1 },
      { day: "2025-04-02", dimension: "certaintyCollapse", meanScore: 0.5, count: 2 },
      { day: "2025-04-02", dimension: "temporalProximity", meanScore: 0.5, count: 2 },
    ]);
  });

  it("should return no rows for no units", () => {
    expect(computePeriodAggregates([])).toEqual([]);
  });
});

describe("refreshPeriodAggregates", () => {
  it("should replace cached rows with the recomputation", async () => {
    await seed("a", "2025-04-03T08:00:00Z", 1);
    await seed("b", "2025-04-03T09:00:00Z", 0);
    repo.setAggregate({ day: "2025-04-10", dimension: "certaintyCollapse", meanScore: 0.9, count: 4 });

    const rows = await refreshPeriodAggregates(repo, RANGE);

    expect(rows).toHaveLength(12);
    expect(await repo.queryPeriodAggregate("certaintyCollapse", RANGE)).toEqual([
      { day: "2025-04-03", dimension: "certaintyCollapse", meanScore: 0.5, count: 2 },
    ]);
  });
});

describe("verifyPeriodAggregates", () => {
  it("should report nothing right after a refresh", async () => {
    await seed("a", "2025-04-03T08:00:00Z", 1);
    await refreshPeriodAggregates(repo, RANGE);

    expect(await verifyPeriodAggregates(repo, RANGE)).toEqual([]);
  });

  it("should report drifted, stale and missing rows", async () => {
    await seed("a", "2025-04-03T08:00:00Z", 1);
    await refreshPeriodAggregates(repo, RANGE);

    repo.setAggregate({ day: "2025-04-03", dimension: "certaintyCollapse", meanScore: 0.7, count: 1 });
    repo.setAggregate({ day: "2025-04-05", dimension: "novelMeme", meanScore: 0, count: 3 });
    await seed("b", "2025-04-06T08:00:00Z", 0);

    const drift = await verifyPeriodAggregates(repo, RANGE);
    const summary = drift.map((d) => [d.day, d.dimension, d.cached !== null, d.expected !== null]);

    expect(summary).toContainEqual(["2025-04-03", "certaintyCollapse", true, true]);
    expect(summary).toContainEqual(["2025-04-05", "novelMeme", true, false]);
    expect(summary).toContainEqual(["2025-04-06", "certaintyCollapse", false, true]);
    // 1 changed + 1 stale + 12 dimensions missing for the new day
    expect(drift).toHaveLength(14);
  });
});
