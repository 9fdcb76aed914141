/**
 * SacredProfane: sacred vocabulary against profane, nihilistic and
 * despairing vocabulary, scaled by marker density.
 *
 * Positive leans sacred, negative leans profane. 0 when no markers match.
 */

import { MARKER_DENSITY_SCALE } from "../config/constants.ts";
import { countWords } from "../lib/math-utils.ts";
import { findPhraseMarkers } from "../lib/text-utils.ts";
import { loadLexicon, sacredProfaneLexiconSchema } from "./lexicon.ts";

const lexicon = loadLexicon("sacred-profane", sacredProfaneLexiconSchema);

export interface SacredProfaneResult {
  score: number;
  ratio: number;
  intensity: number;
  sacred: string[];
  profane: string[];
  nihilism: string[];
  despair: string[];
}

export function scoreSacredProfane(text: string): SacredProfaneResult {
  const sacred = findPhraseMarkers(text, lexicon.sacred);
  const profane = findPhraseMarkers(text, lexicon.profane);
  const nihilism = findPhraseMarkers(text, lexicon.nihilism);
  const despair = findPhraseMarkers(text, lexicon.despair);

  const profaneTotal = profane.length + nihilism.length + despair.length;
  const total = sacred.length + profaneTotal;

  if (total === 0) {
    return { score: 0, ratio: 0, intensity: 0, sacred, profane, nihilism, despair };
  }

  const ratio = (sacred.length - profaneTotal) / total;
  const words = Math.max(countWords(text), 1);
  const intensity = Math.min(1, (total / words) * MARKER_DENSITY_SCALE);

  return { score: ratio * intensity, ratio, intensity, sacred, profane, nihilism, despair };
}
