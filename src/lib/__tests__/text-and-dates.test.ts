/**
 * Text, Day-Key and Argument Helper Tests
 */

import { describe, it, expect } from "vitest";
import { explodeWords, findPhraseMarkers, isBlank } from "../text-utils.ts";
import { addDays, daysBetween, enumerateDays, isDayKey, isWithinRange, parseDayKey, toDayKey } from "../date-utils.ts";
import { parseArgs, parseFlags } from "../cli-args.ts";
import { ConfigurationError } from "../errors.ts";
import { z } from "zod";

describe("text helpers", () => {
  it("should explode words with positions and lower-case forms", () => {
    expect(explodeWords("We're DONE.")).toEqual([
      { text: "We", lower: "we", position: 0 },
      { text: "re", lower: "re", position: 1 },
      { text: "DONE", lower: "done", position: 2 },
    ]);
    expect(explodeWords("")).toEqual([]);
  });

  it("should find each phrase marker once", () => {
    expect(findPhraseMarkers("It's over, IT'S OVER", ["it's over", "too late"])).toEqual(["it's over"]);
  });

  it("should treat whitespace as blank", () => {
    expect(isBlank(" \n\t")).toBe(true);
    expect(isBlank(null)).toBe(true);
    expect(isBlank("x")).toBe(false);
  });
});

describe("day keys", () => {
  it("should key timestamps by UTC day", () => {
    expect(toDayKey(new Date("2024-06-12T23:59:00Z"))).toBe("2024-06-12");
  });

  it("should shift across month and leap-year boundaries", () => {
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
    expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
    expect(daysBetween("2024-02-28", "2024-03-01")).toBe(2);
    expect(daysBetween("2024-03-01", "2024-02-28")).toBe(-2);
  });

  it("should enumerate inclusive ranges", () => {
    expect(enumerateDays("2024-01-30", "2024-02-01")).toEqual(["2024-01-30", "2024-01-31", "2024-02-01"]);
    expect(isWithinRange("2024-01-31", { start: "2024-01-30", end: "2024-02-01" })).toBe(true);
    expect(isWithinRange("2024-02-02", { start: "2024-01-30", end: "2024-02-01" })).toBe(false);
  });

  it("should reject malformed keys", () => {
    expect(isDayKey("2024-6-1")).toBe(false);
    expect(isDayKey("2024-06-01")).toBe(true);
    expect(() => parseDayKey("June 1")).toThrow("Invalid day key: June 1");
  });
});

describe("script arguments", () => {
  it("should read values and bare switches", () => {
    expect(parseFlags(["--start", "2024-06-01", "--models", "--limit", "5"])).toEqual({
      start: "2024-06-01",
      models: "true",
      limit: "5",
    });
  });

  it("should validate against a schema", () => {
    const schema = z.object({ limit: z.coerce.number().int().positive() });
    expect(parseArgs(["--limit", "5"], schema)).toEqual({ limit: 5 });
    expect(() => parseArgs(["--limit", "zero"], schema)).toThrow(ConfigurationError);
  });
});
