/**
 * Marker lexicon loading.
 *
 * Marker lists live in JSON beside this file; each is validated on load
 * and lower-cased once.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const markerList = z.array(z.string().min(1)).transform((items) => items.map((item) => item.toLowerCase()));

export const certaintyLexiconSchema = z.object({
  uncertainty: markerList,
  certainty: markerList,
});

export const pronounLexiconSchema = z.object({
  first: markerList,
  third: markerList,
  collective: markerList,
});

export const sacredProfaneLexiconSchema = z.object({
  sacred: markerList,
  profane: markerList,
  nihilism: markerList,
  despair: markerList,
});

export const timeCompressionLexiconSchema = z.object({
  speed: markerList,
  timeline: markerList,
  overwhelm: markerList,
  intensity: markerList,
});

export const temporalProximityLexiconSchema = z.object({
  immediate: markerList,
  impending: markerList,
  nearTerm: markerList,
  longTerm: markerList,
  amplifiers: markerList,
  hedges: markerList,
});

/**
 * Read and validate `lexicons/<name>.json`.
 */
export function loadLexicon<T extends z.ZodTypeAny>(name: string, schema: T): z.output<T> {
  const url = new URL(`./lexicons/${name}.json`, import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, "utf8"));
  return schema.parse(parsed);
}
