/**
 * PronounFlip: share of first-person, third-person and collective pronouns.
 *
 * Counts are by frequency. The three fractions sum to 1 whenever a pronoun
 * is present and are all 0 otherwise.
 */

import { tokenize } from "../lib/text-utils.ts";
import { loadLexicon, pronounLexiconSchema } from "./lexicon.ts";

const lexicon = loadLexicon("pronoun-flip", pronounLexiconSchema);
const FIRST = new Set(lexicon.first);
const THIRD = new Set(lexicon.third);
const COLLECTIVE = new Set(lexicon.collective);

export interface PronounFlipResult {
  first: number;
  third: number;
  collective: number;
  counts: { first: number; third: number; collective: number; total: number };
}

export function scorePronounFlip(text: string): PronounFlipResult {
  let first = 0;
  let third = 0;
  let collective = 0;

  for (const token of tokenize(text)) {
    if (FIRST.has(token)) first++;
    else if (THIRD.has(token)) third++;
    else if (COLLECTIVE.has(token)) collective++;
  }

  const total = first + third + collective;
  const counts = { first, third, collective, total };
  if (total === 0) {
    return { first: 0, third: 0, collective: 0, counts };
  }

  return {
    first: first / total,
    third: third / total,
    collective: collective / total,
    counts,
  };
}
