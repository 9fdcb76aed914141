/**
 * Structured Logger Tests
 *
 * 1. Ring buffer entries and level filtering
 * 2. Context propagation through withContext and batch lifecycle helpers
 * 3. Counters and timed operations
 */

import { describe, it, expect, afterEach } from "vitest";
import {
  configureLogger,
  getLoggerStats,
  getRecentLogs,
  incrementCounter,
  logBatchComplete,
  logBatchStart,
  logger,
  resetLoggerStats,
  timeOperation,
  withContext,
} from "../structured-logger.ts";

afterEach(() => {
  configureLogger({ minLevel: "DEBUG" });
  resetLoggerStats();
});

describe("logger", () => {
  it("should record structured entries with data and error details", () => {
    logger.info("classifier", "scored", { units: 3 });
    logger.error("classifier", "write failed", new Error("deadlock detected"), { unitId: "u1" });

    const [info, error] = getRecentLogs();
    expect(info).toMatchObject({ level: "INFO", service: "classifier", message: "scored", data: { units: 3 } });
    expect(error.error).toMatchObject({ name: "Error", message: "deadlock detected" });
    expect(getLoggerStats().errorsLogged).toBe(1);
  });

  it("should drop entries below the configured level", () => {
    configureLogger({ minLevel: "WARN" });
    logger.info("svc", "ignored");
    logger.warn("svc", "kept");

    expect(getRecentLogs().map((entry) => entry.message)).toEqual(["kept"]);
    expect(getLoggerStats().logsByLevel).toMatchObject({ INFO: 0, WARN: 1 });
  });

  it("should filter recent logs by level and service", () => {
    logger.debug("a", "one");
    logger.warn("a", "two");
    logger.warn("b", "three");

    expect(getRecentLogs({ level: "WARN", service: "a" }).map((entry) => entry.message)).toEqual(["two"]);
    expect(getRecentLogs({ limit: 1 }).map((entry) => entry.message)).toEqual(["three"]);
  });
});

describe("context propagation", () => {
  it("should attach and then restore context around a call", async () => {
    await withContext({ unitId: "u7" }, async () => {
      logger.info("store", "inside");
    });
    logger.info("store", "outside");

    expect(getRecentLogs({ unitId: "u7" }).map((entry) => entry.message)).toEqual(["inside"]);
    expect(getRecentLogs().at(-1)?.unitId).toBeUndefined();
  });

  it("should tag every log of a batch and count completions", () => {
    logBatchStart("batch_abc", 2, false);
    logger.info("store", "work");
    logBatchComplete({
      batchId: "batch_abc",
      processed: 1,
      skipped: 0,
      errored: 1,
      aborted: true,
      stopped: false,
      durationMs: 5,
    });

    const entries = getRecentLogs({ batchId: "batch_abc" });
    expect(entries).toHaveLength(3);
    expect(entries[2].level).toBe("ERROR");
    expect(getLoggerStats().counters).toEqual({ batches_completed: 1, batches_aborted: 1 });
  });
});

describe("counters and timing", () => {
  it("should accumulate named counters", () => {
    incrementCounter("scorer_failure.novelMeme");
    incrementCounter("scorer_failure.novelMeme", 2);
    expect(getLoggerStats().counters["scorer_failure.novelMeme"]).toBe(3);
  });

  it("should return the result of a timed operation", async () => {
    const { result, durationMs } = await timeOperation("svc", "compute", async () => 42);
    expect(result).toBe(42);
    expect(durationMs).toBeGreaterThanOrEqual(0);
  });

  it("should log and rethrow a failed timed operation", async () => {
    await expect(
      timeOperation("svc", "explode", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(getRecentLogs({ level: "ERROR" })[0].message).toMatch(/^explode failed after \d+ms$/);
  });
});
