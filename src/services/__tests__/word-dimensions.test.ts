/**
 * Word-Dimension Lookup Tests
 *
 * 1. Score band filtering and frequency ordering
 * 2. Default bands and limit clamping
 * 3. Unknown dimensions
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { getWordsByDimension, UnknownDimensionError } from "../word-dimensions.ts";
import { classifyUnit } from "../classification-store.ts";
import { buildDimensionVector } from "../../schemas/dimension-vector.ts";
import { InMemoryClassificationRepository } from "./helpers/in-memory-repository.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let repo: InMemoryClassificationRepository;

beforeEach(async () => {
  repo = new InMemoryClassificationRepository();
  await classifyUnit(repo, { id: "u1", body: "God help" }, buildDimensionVector({ sacredProfane: 0.8 }));
  await classifyUnit(repo, { id: "u2", body: "god is dead" }, buildDimensionVector({ sacredProfane: -0.6 }));
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("getWordsByDimension", () => {
  it("should return words from units inside the score band", async () => {
    const rows = await getWordsByDimension(repo, "sacredProfane", { minScore: 0 });
    expect(rows).toEqual([
      { word: "god", frequency: 1, meanScore: 0.8 },
      { word: "help", frequency: 1, meanScore: 0.8 },
    ]);
  });

  it("should group case variants and order by frequency", async () => {
    const rows = await getWordsByDimension(repo, "sacredProfane");

    expect(rows.map((r) => [r.word, r.frequency])).toEqual([
      ["god", 2],
      ["dead", 1],
      ["help", 1],
      ["is", 1],
    ]);
    expect(rows[0].meanScore).toBeCloseTo(0.1, 10);
  });

  it("should default the band to the dimension range and clamp the limit", async () => {
    const spy = vi.spyOn(repo, "wordsByDimension");

    await getWordsByDimension(repo, "temporalProximity");
    await getWordsByDimension(repo, "certaintyCollapse", { limit: 5000 });
    await getWordsByDimension(repo, "certaintyCollapse", { limit: 0 });

    expect(spy.mock.calls).toEqual([
      ["temporalProximity", { minScore: 0, maxScore: 1, limit: 100 }],
      ["certaintyCollapse", { minScore: -1, maxScore: 1, limit: 1000 }],
      ["certaintyCollapse", { minScore: -1, maxScore: 1, limit: 1 }],
    ]);
  });

  it("should reject an unknown dimension", async () => {
    await expect(getWordsByDimension(repo, "vibes")).rejects.toThrow(UnknownDimensionError);
    await expect(getWordsByDimension(repo, "vibes")).rejects.toMatchObject({ dimension: "vibes" });
  });
});
