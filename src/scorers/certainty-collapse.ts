/**
 * CertaintyCollapse: balance of certainty vs uncertainty vocabulary.
 *
 * Markers are matched against the distinct token set, so repeating a word
 * does not move the score. +1 is all certainty, -1 all hedging.
 */

import { tokenize } from "../lib/text-utils.ts";
import { certaintyLexiconSchema, loadLexicon } from "./lexicon.ts";

const lexicon = loadLexicon("certainty-collapse", certaintyLexiconSchema);

export interface CertaintyCollapseResult {
  score: number;
  certaintyMarkers: string[];
  uncertaintyMarkers: string[];
}

export function scoreCertaintyCollapse(text: string): CertaintyCollapseResult {
  const tokens = new Set(tokenize(text));
  const certaintyMarkers = lexicon.certainty.filter((marker) => tokens.has(marker));
  const uncertaintyMarkers = lexicon.uncertainty.filter((marker) => tokens.has(marker));

  const total = certaintyMarkers.length + uncertaintyMarkers.length;
  const score = total === 0 ? 0 : (certaintyMarkers.length - uncertaintyMarkers.length) / total;

  return { score, certaintyMarkers, uncertaintyMarkers };
}
