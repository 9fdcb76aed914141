/**
 * Deduplicating Classification Store
 *
 * Maps each distinct rounded vector to one stable classification ID and
 * links units (and their words) to it.
 *
 * - Lookup first; insert-or-ignore only on a miss
 * - A lost insert race is resolved by re-reading the winner's row
 * - Word tokens always carry the ID the unit was linked to
 */

import { DuplicateKeyRace } from "../lib/errors.ts";
import { explodeWords } from "../lib/text-utils.ts";
import { vectorKey, type DimensionVector } from "../schemas/dimension-vector.ts";
import type { ClassificationRepository, TextUnit } from "../db/repository.ts";
import { logger } from "./structured-logger.ts";

export interface UpsertResult {
  id: number;
  /** True when this call wrote the row */
  created: boolean;
}

export interface ClassifyUnitResult {
  unitId: string;
  classificationId: number;
  created: boolean;
  /** False when the unit already had a link (rerun) */
  linked: boolean;
  wordsWritten: number;
}

export async function upsertClassification(
  repo: ClassificationRepository,
  vector: DimensionVector,
): Promise<UpsertResult> {
  const existing = await repo.findClassification(vector);
  if (existing !== null) return { id: existing, created: false };

  const inserted = await repo.insertClassification(vector);
  if (inserted !== null) return { id: inserted, created: true };

  // A concurrent writer inserted the same vector between our read and write
  const winner = await repo.findClassification(vector);
  if (winner !== null) {
    logger.debug("classification-store", "Resolved insert race by re-read", { id: winner });
    return { id: winner, created: false };
  }

  throw new DuplicateKeyRace(`insert of vector ${vectorKey(vector)} conflicted but no row is visible`);
}

/**
 * Upsert the unit's classification, link the unit, and write its words
 * tagged with the same ID in one batch.
 */
export async function classifyUnit(
  repo: ClassificationRepository,
  unit: Pick<TextUnit, "id" | "body">,
  vector: DimensionVector,
): Promise<ClassifyUnitResult> {
  const { id, created } = await upsertClassification(repo, vector);
  const linked = await repo.linkTextUnit(unit.id, id);

  if (!linked) {
    return { unitId: unit.id, classificationId: id, created, linked, wordsWritten: 0 };
  }

  const wordsWritten = await repo.insertWordTokens(unit.id, id, explodeWords(unit.body));
  return { unitId: unit.id, classificationId: id, created, linked, wordsWritten };
}
