/**
 * TemporalProximity: how near in time the text places its subject.
 *
 * Phrase markers and 20xx year mentions are bucketed into four classes;
 * the nearest class present wins. Amplifier and hedge words are reported
 * alongside but never change the score.
 */

import { NEAR_TERM_YEAR_HORIZON, PROXIMITY_SCORES } from "../config/constants.ts";
import { findPhraseMarkers } from "../lib/text-utils.ts";
import { loadLexicon, temporalProximityLexiconSchema } from "./lexicon.ts";

const lexicon = loadLexicon("temporal-proximity", temporalProximityLexiconSchema);

const YEAR_PATTERN = /\b20\d{2}\b/g;

export type ProximityCategory = keyof typeof PROXIMITY_SCORES;

export interface TemporalProximityResult {
  score: number;
  category: ProximityCategory;
  counts: Record<Exclude<ProximityCategory, "unspecified">, number>;
  years: number[];
  amplifiers: string[];
  hedges: string[];
}

/**
 * Bucket a year mention relative to the reference year.
 *
 * @example
 * classifyYear(2025, 2025) // "immediate"
 * classifyYear(2023, 2025) // "near-term"
 * classifyYear(2030, 2025) // "long-term"
 */
export function classifyYear(year: number, referenceYear: number): Exclude<ProximityCategory, "unspecified"> {
  if (year === referenceYear) return "immediate";
  if (year === referenceYear + 1) return "impending";
  if (year <= referenceYear + NEAR_TERM_YEAR_HORIZON) return "near-term";
  return "long-term";
}

export function scoreTemporalProximity(text: string, referenceYear: number): TemporalProximityResult {
  const counts = {
    immediate: findPhraseMarkers(text, lexicon.immediate).length,
    impending: findPhraseMarkers(text, lexicon.impending).length,
    "near-term": findPhraseMarkers(text, lexicon.nearTerm).length,
    "long-term": findPhraseMarkers(text, lexicon.longTerm).length,
  };

  const years = (text.match(YEAR_PATTERN) ?? []).map((year) => Number.parseInt(year, 10));
  for (const year of years) {
    counts[classifyYear(year, referenceYear)]++;
  }

  let category: ProximityCategory = "unspecified";
  if (counts.immediate > 0) category = "immediate";
  else if (counts.impending > 0) category = "impending";
  else if (counts["near-term"] > 0) category = "near-term";
  else if (counts["long-term"] > 0) category = "long-term";

  let amplifiers: string[] = [];
  let hedges: string[] = [];
  if (category !== "unspecified") {
    const words = new Set(text.toLowerCase().split(/\s+/));
    amplifiers = lexicon.amplifiers.filter((word) => words.has(word));
    hedges = lexicon.hedges.filter((word) => words.has(word));
  }

  return {
    score: PROXIMITY_SCORES[category],
    category,
    counts,
    years,
    amplifiers,
    hedges,
  };
}
