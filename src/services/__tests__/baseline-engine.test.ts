/**
 * Baseline & Anomaly Engine Tests
 *
 * 1. Distribution statistics over a reference window
 * 2. z-scores, including the zero-variance sentinel
 * 3. Window comparison against the reference days
 * 4. Warning peak search before an event
 */

import { describe, it, expect } from "vitest";
import { compareWindow, computeBaseline, findWarningPeak, zScore } from "../baseline-engine.ts";
import type { DailyObservation } from "../daily-series.ts";
import { addDays } from "../../lib/date-utils.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function series(start: string, values: number[]): DailyObservation[] {
  return values.map((value, i) => ({ day: addDays(start, i), value }));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("computeBaseline", () => {
  it("should describe the reference window", () => {
    const baseline = computeBaseline("certaintyCollapse", series("2025-01-01", [1, 2, 1, 2, 1]));

    expect(baseline.mean).toBeCloseTo(1.4, 12);
    expect(baseline.std).toBeCloseTo(Math.sqrt(0.24), 12);
    expect(baseline.p50).toBe(1);
    expect(baseline.p75).toBe(2);
    expect(baseline.p90).toBe(2);
    expect(baseline.max).toBe(2);
    expect(baseline.n).toBe(5);
  });

  it("should return an all-zero distribution for no observations", () => {
    expect(computeBaseline("novelMeme", [])).toEqual({
      dimension: "novelMeme",
      mean: 0,
      std: 0,
      p50: 0,
      p75: 0,
      p90: 0,
      p95: 0,
      p99: 0,
      max: 0,
      n: 0,
    });
  });
});

describe("zScore", () => {
  it("should standardize against the baseline", () => {
    const baseline = computeBaseline("certaintyCollapse", series("2025-01-01", [1, 2, 1, 2, 1]));
    expect(zScore(10, baseline)).toBeCloseTo(17.554, 3);
  });

  it("should use the sentinel above a zero-variance mean", () => {
    expect(zScore(3, { mean: 2, std: 0 })).toBe(10);
    expect(zScore(3, { mean: 2, std: 0 }, 5)).toBe(5);
    expect(zScore(2, { mean: 2, std: 0 })).toBe(0);
    expect(zScore(1, { mean: 2, std: 0 })).toBe(0);
  });
});

describe("compareWindow", () => {
  it("should rank the target mean against the reference days", () => {
    const reference = [1, 2, 1, 2, 1];
    const baseline = computeBaseline("certaintyCollapse", series("2025-01-01", reference));

    const result = compareWindow(baseline, reference, [3, 3]);

    expect(result.targetMean).toBe(3);
    expect(result.percentileRank).toBe(100);
    expect(result.zScore).toBeCloseTo(1.6 / Math.sqrt(0.24), 10);
    expect(result.aboveP90).toBe(true);
    expect(result.aboveP95).toBe(true);
  });

  it("should not flag a window at the median", () => {
    const reference = [1, 2, 1, 2, 1];
    const baseline = computeBaseline("certaintyCollapse", series("2025-01-01", reference));

    const result = compareWindow(baseline, reference, [1]);

    expect(result.percentileRank).toBe(0);
    expect(result.aboveP90).toBe(false);
  });
});

describe("findWarningPeak", () => {
  const history = series("2025-05-01", [0.1, 0.2, 0.1, 0.2, 0.1, 0.2, 0.5, 0.3, 0.5, 0.4]);
  const baseline = computeBaseline("timeCompression", history.slice(0, 6));

  it("should take the earliest highest day inside the warning window", () => {
    const peak = findWarningPeak(history, "2025-05-10", 3, baseline);

    expect(peak).toEqual({
      dimension: "timeCompression",
      peakDay: "2025-05-07",
      peakValue: 0.5,
      leadDays: 3,
      peakPercentileRank: 80,
      aboveP90: true,
      aboveP95: true,
      eventValue: 0.4,
      eventPercentileRank: 70,
      eventAboveP95: true,
    });
  });

  it("should exclude the event day itself", () => {
    const peak = findWarningPeak(history, "2025-05-10", 1, baseline);
    expect(peak?.peakDay).toBe("2025-05-09");
    expect(peak?.leadDays).toBe(1);
  });

  it("should report null event fields when the event day has no data", () => {
    const peak = findWarningPeak(history, "2025-05-11", 2, baseline);
    expect(peak?.peakDay).toBe("2025-05-09");
    expect(peak?.eventValue).toBeNull();
    expect(peak?.eventPercentileRank).toBeNull();
    expect(peak?.eventAboveP95).toBeNull();
  });

  it("should return null when nothing falls in the window", () => {
    expect(findWarningPeak(history, "2025-06-30", 7, baseline)).toBeNull();
  });
});
