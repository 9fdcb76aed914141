/**
 * Word-Dimension Lookup
 *
 * Which words appear in units whose score on a dimension falls in a band,
 * how often, and with what mean score.
 */

import { DEFAULT_WORD_LIMIT, MAX_WORD_LIMIT } from "../config/constants.ts";
import type { ClassificationRepository, WordDimensionRow } from "../db/repository.ts";
import { dimensionKeySchema, DIMENSION_SPECS } from "../schemas/dimension-vector.ts";

export interface WordLookupOptions {
  minScore?: number;
  maxScore?: number;
  limit?: number;
}

export class UnknownDimensionError extends Error {
  constructor(public readonly dimension: string) {
    super(`Unknown dimension: ${dimension}`);
    this.name = "UnknownDimensionError";
  }
}

/**
 * @example
 * await getWordsByDimension(repo, "sacredProfane", { maxScore: -0.5, limit: 20 })
 * // [{ word: "cooked", frequency: 12, meanScore: -0.71 }, ...]
 */
export async function getWordsByDimension(
  repo: ClassificationRepository,
  dimension: string,
  options: WordLookupOptions = {},
): Promise<WordDimensionRow[]> {
  const parsed = dimensionKeySchema.safeParse(dimension);
  if (!parsed.success) throw new UnknownDimensionError(dimension);

  const spec = DIMENSION_SPECS[parsed.data];
  const limit = Math.min(Math.max(1, options.limit ?? DEFAULT_WORD_LIMIT), MAX_WORD_LIMIT);

  return repo.wordsByDimension(parsed.data, {
    minScore: options.minScore ?? spec.min,
    maxScore: options.maxScore ?? spec.max,
    limit,
  });
}
