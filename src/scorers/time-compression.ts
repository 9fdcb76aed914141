/**
 * TimeCompression: language of acceleration and overload.
 *
 * Density of matched markers, boosted 10% per marker class present.
 */

import { COMPRESSION_CATEGORY_BONUS, MARKER_DENSITY_SCALE } from "../config/constants.ts";
import { countWords } from "../lib/math-utils.ts";
import { findPhraseMarkers } from "../lib/text-utils.ts";
import { loadLexicon, timeCompressionLexiconSchema } from "./lexicon.ts";

const lexicon = loadLexicon("time-compression", timeCompressionLexiconSchema);

export interface TimeCompressionResult {
  score: number;
  speed: string[];
  timeline: string[];
  overwhelm: string[];
  intensity: string[];
  classesPresent: number;
}

export function scoreTimeCompression(text: string): TimeCompressionResult {
  const speed = findPhraseMarkers(text, lexicon.speed);
  const timeline = findPhraseMarkers(text, lexicon.timeline);
  const overwhelm = findPhraseMarkers(text, lexicon.overwhelm);
  const intensity = findPhraseMarkers(text, lexicon.intensity);

  const words = countWords(text);
  if (words === 0) {
    return { score: 0, speed, timeline, overwhelm, intensity, classesPresent: 0 };
  }

  const classes = [speed, timeline, overwhelm, intensity];
  const total = classes.reduce((sum, found) => sum + found.length, 0);
  const classesPresent = classes.filter((found) => found.length > 0).length;

  const base = Math.min(1, (total / words) * MARKER_DENSITY_SCALE);
  const multiplier = 1 + classesPresent * COMPRESSION_CATEGORY_BONUS;

  return {
    score: Math.min(1, base * multiplier),
    speed,
    timeline,
    overwhelm,
    intensity,
    classesPresent,
  };
}
