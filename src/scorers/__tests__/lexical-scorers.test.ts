/**
 * Lexical Scorer Tests
 *
 * Covers the five marker-based dimensions:
 * 1. CertaintyCollapse balance over distinct tokens
 * 2. PronounFlip fractions by frequency
 * 3. TemporalProximity categories, year buckets and auxiliary words
 * 4. SacredProfane ratio and density
 * 5. TimeCompression density and class bonus
 */

import { describe, it, expect } from "vitest";
import { scoreCertaintyCollapse } from "../certainty-collapse.ts";
import { scorePronounFlip } from "../pronoun-flip.ts";
import { classifyYear, scoreTemporalProximity } from "../temporal-proximity.ts";
import { scoreSacredProfane } from "../sacred-profane.ts";
import { scoreTimeCompression } from "../time-compression.ts";
import { createSeededRandom } from "../../lib/math-utils.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PRONOUN_MIX = ["i", "me", "my", "she", "his", "them", "we", "our", "They", "ME"];
const FILLER = ["the", "river", "runs", "quiet", "today", "maybe", "someone", "called", "it's"];

/** Seeded sentences of 1-12 words mixing pronouns and filler */
function generatedSentences(count: number, seed: number): string[] {
  const random = createSeededRandom(seed);
  const pick = (words: readonly string[]) => words[Math.floor(random() * words.length)];
  return Array.from({ length: count }, () => {
    const length = 1 + Math.floor(random() * 12);
    return Array.from({ length }, () => (random() < 0.3 ? pick(PRONOUN_MIX) : pick(FILLER))).join(" ");
  });
}

/** One marker followed by filler words, 200 words in total */
function diluted(marker: string): string {
  return [marker, ...Array<string>(199).fill("calm")].join(" ");
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("scoreCertaintyCollapse", () => {
  it("should balance certainty markers against uncertainty markers", () => {
    const result = scoreCertaintyCollapse("It will definitely happen, maybe.");
    expect(result.certaintyMarkers).toEqual(["will", "definitely"]);
    expect(result.uncertaintyMarkers).toEqual(["maybe"]);
    expect(result.score).toBeCloseTo(1 / 3, 10);
  });

  it("should count a repeated marker once", () => {
    expect(scoreCertaintyCollapse("will will will maybe").score).toBe(0);
  });

  it("should return +1 for pure certainty", () => {
    expect(scoreCertaintyCollapse("This is absolutely confirmed").score).toBe(1);
  });

  it("should return 0 when no markers are present", () => {
    expect(scoreCertaintyCollapse("the cat sat").score).toBe(0);
    expect(scoreCertaintyCollapse("").score).toBe(0);
  });
});

describe("scorePronounFlip", () => {
  it("should split pronoun counts into fractions", () => {
    const result = scorePronounFlip("I think we should tell them and me");
    expect(result.counts).toEqual({ first: 2, third: 0, collective: 2, total: 4 });
    expect(result.first).toBe(0.5);
    expect(result.third).toBe(0);
    expect(result.collective).toBe(0.5);
  });

  it("should give 1.0 to the only class present", () => {
    expect(scorePronounFlip("She said he left").third).toBe(1);
  });

  it("should return all zeros without pronouns", () => {
    const result = scorePronounFlip("The weather is nice");
    expect([result.first, result.third, result.collective]).toEqual([0, 0, 0]);
    expect(result.counts.total).toBe(0);
  });

  it("should sum the fractions to 1 for any text with a pronoun", () => {
    const sentences = generatedSentences(200, 11);
    let withPronouns = 0;

    for (const sentence of sentences) {
      const result = scorePronounFlip(sentence);
      const fractions = [result.first, result.third, result.collective];
      for (const fraction of fractions) {
        expect(fraction).toBeGreaterThanOrEqual(0);
        expect(fraction).toBeLessThanOrEqual(1);
      }
      if (result.counts.total > 0) {
        withPronouns++;
        expect(result.first + result.third + result.collective).toBeCloseTo(1, 10);
      } else {
        expect(fractions).toEqual([0, 0, 0]);
      }
    }

    expect(withPronouns).toBeGreaterThan(0);
    expect(withPronouns).toBeLessThan(sentences.length);
  });
});

describe("classifyYear", () => {
  it("should bucket years relative to the reference year", () => {
    expect(classifyYear(2025, 2025)).toBe("immediate");
    expect(classifyYear(2026, 2025)).toBe("impending");
    expect(classifyYear(2028, 2025)).toBe("near-term");
    expect(classifyYear(2019, 2025)).toBe("near-term");
    expect(classifyYear(2029, 2025)).toBe("long-term");
  });
});

describe("scoreTemporalProximity", () => {
  it("should score a far-future year as long-term", () => {
    const result = scoreTemporalProximity("Prices rise in 2031", 2025);
    expect(result.years).toEqual([2031]);
    expect(result.category).toBe("long-term");
    expect(result.score).toBe(0);
  });

  it("should score next year as impending", () => {
    const result = scoreTemporalProximity("Expect the shift in 2026", 2025);
    expect(result.category).toBe("impending");
    expect(result.score).toBe(0.66);
  });

  it("should treat past years as near-term", () => {
    expect(scoreTemporalProximity("It happened in 2019", 2025).score).toBe(0.33);
  });

  it("should pick the nearest class present", () => {
    const result = scoreTemporalProximity("soon, but next month too", 2025);
    expect(result.counts.impending).toBe(1);
    expect(result.counts["near-term"]).toBe(1);
    expect(result.category).toBe("impending");
  });

  it("should return 0.5 when nothing temporal is said", () => {
    const result = scoreTemporalProximity("Nothing to report", 2025);
    expect(result.category).toBe("unspecified");
    expect(result.score).toBe(0.5);
  });

  it("should report amplifiers and hedges without changing the score", () => {
    const result = scoreTemporalProximity("It is very much happening today, maybe", 2025);
    expect(result.category).toBe("immediate");
    expect(result.score).toBe(1);
    expect(result.amplifiers).toEqual(["very"]);
    expect(result.hedges).toEqual(["maybe"]);
  });

  it("should ignore auxiliary words when no temporal marker is present", () => {
    const result = scoreTemporalProximity("very maybe", 2025);
    expect(result.amplifiers).toEqual([]);
    expect(result.hedges).toEqual([]);
  });
});

describe("scoreSacredProfane", () => {
  it("should score nihilistic phrases as fully profane", () => {
    const result = scoreSacredProfane("we're cooked, it's over, nothing matters");
    expect(result.nihilism).toEqual(["we're cooked", "it's over", "nothing matters"]);
    expect(result.ratio).toBe(-1);
    expect(result.intensity).toBe(1);
    expect(result.score).toBe(-1);
  });

  it("should score sacred phrases as fully sacred", () => {
    const result = scoreSacredProfane("Thank god, a miracle");
    expect(result.sacred).toEqual(["god", "miracle", "thank god"]);
    expect(result.score).toBe(1);
  });

  it("should weigh mixed vocabulary", () => {
    const result = scoreSacredProfane("pray for us, we're doomed");
    expect(result.sacred).toEqual(["pray"]);
    expect(result.profane).toEqual(["doomed", "doom"]);
    expect(result.score).toBeCloseTo(-1 / 3, 10);
  });

  it("should scale by marker density", () => {
    const result = scoreSacredProfane(diluted("amen"));
    expect(result.intensity).toBeCloseTo(0.5, 10);
    expect(result.score).toBeCloseTo(0.5, 10);
  });

  it("should return 0 without markers", () => {
    expect(scoreSacredProfane("The weather is mild").score).toBe(0);
  });
});

describe("scoreTimeCompression", () => {
  it("should cap dense multi-class text at 1", () => {
    const result = scoreTimeCompression("everything is happening so fast, it's insane");
    expect(result.speed).toEqual(["so fast"]);
    expect(result.intensity).toEqual(["insane"]);
    expect(result.classesPresent).toBe(2);
    expect(result.score).toBe(1);
  });

  it("should apply the class bonus to sparse text", () => {
    const result = scoreTimeCompression(diluted("record"));
    expect(result.classesPresent).toBe(1);
    expect(result.score).toBeCloseTo(0.55, 10);
  });

  it("should attribute nothing to nihilistic text without speed or overwhelm markers", () => {
    const result = scoreTimeCompression("we're cooked, it's over, nothing matters");
    expect(result.classesPresent).toBe(0);
    expect(result.score).toBe(0);
  });

  it("should return 0 for empty or blank text", () => {
    expect(scoreTimeCompression("").score).toBe(0);
    expect(scoreTimeCompression("   ").score).toBe(0);
  });
});
