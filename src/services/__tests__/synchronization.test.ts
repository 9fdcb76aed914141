/**
 * Synchronization & Asymmetry Tests
 *
 * 1. First/second derivatives with gaps
 * 2. Exceedance counting against k sample standard deviations
 * 3. Score bounds and monotonicity in the number of moving dimensions
 * 4. Pre/post asymmetry per dimension and across dimensions
 */

import { describe, it, expect } from "vitest";
import { computeDerivatives, computeSynchronization } from "../synchronization.ts";
import { computeAsymmetry, dimensionAsymmetry } from "../asymmetry.ts";
import { createSeededRandom } from "../../lib/math-utils.ts";
import { DIMENSION_KEYS, type DimensionKey } from "../../schemas/dimension-vector.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function seriesMap(
  entries: Array<[DimensionKey, Array<number | null>]>,
): Map<DimensionKey, Array<number | null>> {
  return new Map(entries);
}

/** `moving` of six dimensions step from 0 to 10 on day 6 of 12; the rest stay flat */
function stepMap(moving: number): Map<DimensionKey, Array<number | null>> {
  const step = [0, 0, 0, 0, 0, 0, 10, 10, 10, 10, 10, 10];
  const flat = step.map(() => 3);
  return new Map<DimensionKey, Array<number | null>>(
    DIMENSION_KEYS.slice(0, 6).map((key, i) => [key, i < moving ? step : flat] as const),
  );
}

/** Every dimension over `days` of seeded noise with occasional gaps and bursts */
function noiseMap(seed: number, days: number): Map<DimensionKey, Array<number | null>> {
  const random = createSeededRandom(seed);
  return new Map<DimensionKey, Array<number | null>>(
    DIMENSION_KEYS.map((key) => {
      const series = Array.from({ length: days }, (): number | null => {
        if (random() < 0.1) return null;
        return random() * (random() < 0.05 ? 20 : 1);
      });
      return [key, series] as const;
    }),
  );
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("computeDerivatives", () => {
  it("should difference twice", () => {
    expect(computeDerivatives([1, 3, 6])).toEqual({ first: [null, 2, 3], second: [null, null, 1] });
  });

  it("should propagate gaps into both derivatives", () => {
    expect(computeDerivatives([1, null, 4, 6])).toEqual({
      first: [null, null, null, 2],
      second: [null, null, null, null],
    });
  });
});

describe("computeSynchronization", () => {
  it("should count dimensions whose derivative jumps on the same day", () => {
    const points = computeSynchronization(
      seriesMap([
        ["certaintyCollapse", [0, 0, 0, 10, 10, 10]],
        ["novelMeme", [1, 1, 1, 1, 1, 1]],
      ]),
    );

    expect(points.map((p) => p.score)).toEqual([0, 0, 0, 0.25, 0, 0]);
    expect(points[3]).toEqual({ index: 3, firstExceedances: 1, secondExceedances: 0, score: 0.25 });
  });

  it("should flag both derivatives around a one-day spike", () => {
    const points = computeSynchronization(seriesMap([["timeCompression", [0, 0, 0, 10, 0, 0, 0]]]));

    expect(points.map((p) => p.score)).toEqual([0, 0, 0, 0.5, 1, 0, 0]);
  });

  it("should flag nothing in a series with fewer than two defined deltas", () => {
    const points = computeSynchronization(seriesMap([["sacredProfane", [5, null, null, 7]]]));
    expect(points.every((p) => p.score === 0)).toBe(true);
  });

  it("should return no points without dimensions", () => {
    expect(computeSynchronization(new Map())).toEqual([]);
  });

  it("should rise with the number of dimensions moving on the same day", () => {
    const scores = [0, 1, 2, 3, 4, 5, 6].map((moving) => computeSynchronization(stepMap(moving))[6].score);

    // Each moving dimension exceeds on both derivatives at the step
    scores.forEach((score, moving) => expect(score).toBeCloseTo(moving / 6, 10));
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1]);
    }
    expect(scores[6]).toBe(1);
  });

  for (const seed of [3, 19, 2024]) {
    it(`should stay within [0, 1] and order by exceedances over noisy input (seed ${seed})`, () => {
      const points = computeSynchronization(noiseMap(seed, 90));
      const dimensions = DIMENSION_KEYS.length;

      expect(points).toHaveLength(90);
      for (const point of points) {
        expect(point.score).toBeGreaterThanOrEqual(0);
        expect(point.score).toBeLessThanOrEqual(1);
        expect(point.score).toBeCloseTo((point.firstExceedances + point.secondExceedances) / (2 * dimensions), 12);
      }

      const byCount = [...points].sort(
        (a, b) => a.firstExceedances + a.secondExceedances - (b.firstExceedances + b.secondExceedances),
      );
      for (let i = 1; i < byCount.length; i++) {
        expect(byCount[i].score).toBeGreaterThanOrEqual(byCount[i - 1].score);
      }
      expect(points.some((p) => p.score > 0)).toBe(true);
    });
  }

  it("should reject series of unequal length", () => {
    expect(() =>
      computeSynchronization(
        seriesMap([
          ["certaintyCollapse", [1, 2, 3]],
          ["novelMeme", [1, 2]],
        ]),
      ),
    ).toThrow("equal length");
  });
});

describe("dimensionAsymmetry", () => {
  it("should scale both dips by the height over the long-run mean", () => {
    // long-run mean 9 / 5 = 1.8, height 3.2, dips 4 + 4
    expect(dimensionAsymmetry([1, 1, 5, 1, 1], 2, 2, 1.8)).toBeCloseTo(2.5, 10);
  });

  it("should floor dips at zero for a trough", () => {
    expect(dimensionAsymmetry([3, 3, 1, 3, 3], 2, 2, 2.6)).toBe(0);
  });

  it("should not contribute at a gap, an empty side or zero height", () => {
    expect(dimensionAsymmetry([1, 1, null, 1, 1], 2, 2, 1)).toBeNull();
    expect(dimensionAsymmetry([null, null, 5, 1, 1], 2, 2, 1.8)).toBeNull();
    expect(dimensionAsymmetry([2, 2, 2], 1, 1, 2)).toBeNull();
  });
});

describe("computeAsymmetry", () => {
  it("should leave edge days without a full window null", () => {
    const result = computeAsymmetry(seriesMap([["certaintyCollapse", [1, 1, 5, 1, 1]]]), 2);
    expect(result.map((v) => v === null)).toEqual([true, true, false, true, true]);
    expect(result[2]).toBeCloseTo(2.5, 10);
  });

  it("should average the contributing dimensions", () => {
    const result = computeAsymmetry(
      seriesMap([
        ["certaintyCollapse", [1, 1, 5, 1, 1]],
        ["novelMeme", [3, 3, 1, 3, 3]],
        ["metaphorDensity", [null, null, null, null, null]],
      ]),
      2,
    );
    expect(result[2]).toBeCloseTo(1.25, 10);
  });

  it("should return nothing without dimensions", () => {
    expect(computeAsymmetry(new Map())).toEqual([]);
  });
});
