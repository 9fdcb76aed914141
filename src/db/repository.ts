/**
 * Persistence contract for the classification store and derived tables.
 *
 * `DrizzleClassificationRepository` implements it over PostgreSQL; tests
 * use an in-process implementation. Every write is idempotent so a
 * redone chunk changes nothing.
 */

import type { DimensionKey, DimensionVector } from "../schemas/dimension-vector.ts";
import type { DayRange } from "../lib/date-utils.ts";
import type { WordOccurrence } from "../lib/text-utils.ts";

export interface TextUnit {
  id: string;
  platform: string;
  parentId: string | null;
  createdAt: Date;
  body: string;
}

/** A classified unit joined with its vector */
export interface ScoredUnit {
  unitId: string;
  platform: string;
  createdAt: Date;
  vector: DimensionVector;
}

export interface PeriodAggregateRow {
  /** UTC day, YYYY-MM-DD */
  day: string;
  dimension: DimensionKey;
  meanScore: number;
  count: number;
}

export interface BaselineRow {
  dimension: DimensionKey;
  windowStart: string;
  windowEnd: string;
  mean: number;
  std: number;
  p50: number;
  p75: number;
  p90: number;
  p95: number;
  p99: number;
  max: number;
  n: number;
}

export interface CoherenceSampleRow {
  day: string;
  coherenceScore: number;
  asymmetryScore: number | null;
  eventCoherenceIndex: number | null;
}

export interface WordDimensionRow {
  word: string;
  frequency: number;
  meanScore: number;
}

export interface WordQuery {
  minScore?: number;
  maxScore?: number;
  limit: number;
}

export interface UnitFilter {
  platform?: string;
}

export interface ClassificationRepository {
  /** ID of the classification equal to `vector` in every component */
  findClassification(vector: DimensionVector): Promise<number | null>;

  /** Atomic insert-or-ignore; null when a row with the same vector exists */
  insertClassification(vector: DimensionVector): Promise<number | null>;

  /** Idempotent; true when the link was newly written */
  linkTextUnit(unitId: string, classificationId: number): Promise<boolean>;

  /** Batch insert-or-ignore on (unit, position); returns rows written */
  insertWordTokens(unitId: string, classificationId: number, words: readonly WordOccurrence[]): Promise<number>;

  /** Subset of `unitIds` that already have a classification link */
  findClassifiedUnitIds(unitIds: readonly string[]): Promise<Set<string>>;

  /** Units created within the range (UTC days, inclusive), oldest first */
  listTextUnits(range: DayRange, filter?: UnitFilter): Promise<TextUnit[]>;

  /** Classified units within the range joined with their vectors */
  listScoredUnits(range: DayRange, filter?: UnitFilter): Promise<ScoredUnit[]>;

  /** Cached per-day aggregates for one dimension, ordered by day */
  queryPeriodAggregate(dimension: DimensionKey, range: DayRange): Promise<PeriodAggregateRow[]>;

  /** Delete cached aggregates in the range and write `rows` */
  replacePeriodAggregates(range: DayRange, rows: readonly PeriodAggregateRow[]): Promise<void>;

  /** Upsert on (dimension, windowStart, windowEnd) */
  saveBaseline(row: BaselineRow): Promise<void>;

  /** Most recently computed baseline for the dimension */
  getLatestBaseline(dimension: DimensionKey): Promise<BaselineRow | null>;

  replaceCoherenceSamples(range: DayRange, rows: readonly CoherenceSampleRow[]): Promise<void>;

  listCoherenceSamples(range: DayRange): Promise<CoherenceSampleRow[]>;

  /** Word frequency and mean score over units whose score falls in the band */
  wordsByDimension(dimension: DimensionKey, query: WordQuery): Promise<WordDimensionRow[]>;

  /**
   * Run `fn` atomically. Calling `transaction` on the repository passed to
   * `fn` opens a savepoint.
   */
  transaction<T>(fn: (repo: ClassificationRepository) => Promise<T>): Promise<T>;
}
