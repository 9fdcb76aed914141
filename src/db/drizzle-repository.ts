/**
 * PostgreSQL implementation of ClassificationRepository (drizzle-orm).
 *
 * Works over either the root database or a transaction handle; calling
 * `transaction` on a repository built from a transaction opens a
 * savepoint.
 */

import { and, asc, desc, eq, gte, inArray, lt, lte, sql, type SQL } from "drizzle-orm";
import type { AnyPgColumn, PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import * as schema from "./schema/index.ts";
import {
  baselineDistributions,
  classifications,
  coherenceSamples,
  periodAggregates,
  textUnitClassifications,
  textUnits,
  wordTokens,
} from "./schema/index.ts";
import { DIMENSION_KEYS, type DimensionKey, type DimensionVector } from "../schemas/dimension-vector.ts";
import { addDays, parseDayKey, type DayRange } from "../lib/date-utils.ts";
import { chunk } from "../lib/math-utils.ts";
import type { WordOccurrence } from "../lib/text-utils.ts";
import type {
  BaselineRow,
  ClassificationRepository,
  CoherenceSampleRow,
  PeriodAggregateRow,
  ScoredUnit,
  TextUnit,
  UnitFilter,
  WordDimensionRow,
  WordQuery,
} from "./repository.ts";

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

/** Rows per multi-row insert (5 params each, well under pg's 65535 limit) */
const WORD_INSERT_CHUNK = 1_000;

const DIMENSION_COLUMNS: Record<DimensionKey, AnyPgColumn> = {
  certaintyCollapse: classifications.certaintyCollapse,
  pronounFirst: classifications.pronounFirst,
  pronounThird: classifications.pronounThird,
  pronounCollective: classifications.pronounCollective,
  emotionalValence: classifications.emotionalValence,
  temporalBleed: classifications.temporalBleed,
  timeCompression: classifications.timeCompression,
  sacredProfane: classifications.sacredProfane,
  temporalProximity: classifications.temporalProximity,
  agencyReversal: classifications.agencyReversal,
  metaphorDensity: classifications.metaphorDensity,
  novelMeme: classifications.novelMeme,
};

function vectorCondition(vector: DimensionVector): SQL | undefined {
  return and(...DIMENSION_KEYS.map((key) => eq(DIMENSION_COLUMNS[key], vector[key])));
}

function createdWithin(range: DayRange, filter?: UnitFilter): SQL | undefined {
  return and(
    gte(textUnits.createdAt, parseDayKey(range.start)),
    lt(textUnits.createdAt, parseDayKey(addDays(range.end, 1))),
    filter?.platform ? eq(textUnits.platform, filter.platform) : undefined,
  );
}

function pickVector(row: DimensionVector): DimensionVector {
  return {
    certaintyCollapse: row.certaintyCollapse,
    pronounFirst: row.pronounFirst,
    pronounThird: row.pronounThird,
    pronounCollective: row.pronounCollective,
    emotionalValence: row.emotionalValence,
    temporalBleed: row.temporalBleed,
    timeCompression: row.timeCompression,
    sacredProfane: row.sacredProfane,
    temporalProximity: row.temporalProximity,
    agencyReversal: row.agencyReversal,
    metaphorDensity: row.metaphorDensity,
    novelMeme: row.novelMeme,
  };
}

export class DrizzleClassificationRepository implements ClassificationRepository {
  constructor(private readonly db: Executor) {}

  async findClassification(vector: DimensionVector): Promise<number | null> {
    const rows = await this.db
      .select({ id: classifications.id })
      .from(classifications)
      .where(vectorCondition(vector))
      .limit(1);
    return rows[0]?.id ?? null;
  }

  async insertClassification(vector: DimensionVector): Promise<number | null> {
    const rows = await this.db
      .insert(classifications)
      .values(pickVector(vector))
      .onConflictDoNothing()
      .returning({ id: classifications.id });
    return rows[0]?.id ?? null;
  }

  async linkTextUnit(unitId: string, classificationId: number): Promise<boolean> {
    const rows = await this.db
      .insert(textUnitClassifications)
      .values({ unitId, classificationId })
      .onConflictDoNothing()
      .returning({ unitId: textUnitClassifications.unitId });
    return rows.length > 0;
  }

  async insertWordTokens(
    unitId: string,
    classificationId: number,
    words: readonly WordOccurrence[],
  ): Promise<number> {
    let written = 0;
    for (const batch of chunk(words, WORD_INSERT_CHUNK)) {
      const rows = await this.db
        .insert(wordTokens)
        .values(
          batch.map((word) => ({
            unitId,
            classificationId,
            wordText: word.text,
            wordLower: word.lower,
            position: word.position,
          })),
        )
        .onConflictDoNothing()
        .returning({ id: wordTokens.id });
      written += rows.length;
    }
    return written;
  }

  async findClassifiedUnitIds(unitIds: readonly string[]): Promise<Set<string>> {
    if (unitIds.length === 0) return new Set();
    const rows = await this.db
      .select({ unitId: textUnitClassifications.unitId })
      .from(textUnitClassifications)
      .where(inArray(textUnitClassifications.unitId, [...unitIds]));
    return new Set(rows.map((row) => row.unitId));
  }

  async listTextUnits(range: DayRange, filter?: UnitFilter): Promise<TextUnit[]> {
    return this.db
      .select({
        id: textUnits.id,
        platform: textUnits.platform,
        parentId: textUnits.parentId,
        createdAt: textUnits.createdAt,
        body: textUnits.body,
      })
      .from(textUnits)
      .where(createdWithin(range, filter))
      .orderBy(asc(textUnits.createdAt), asc(textUnits.id));
  }

  async listScoredUnits(range: DayRange, filter?: UnitFilter): Promise<ScoredUnit[]> {
    const rows = await this.db
      .select({
        unitId: textUnits.id,
        platform: textUnits.platform,
        createdAt: textUnits.createdAt,
        classification: classifications,
      })
      .from(textUnitClassifications)
      .innerJoin(textUnits, eq(textUnitClassifications.unitId, textUnits.id))
      .innerJoin(classifications, eq(textUnitClassifications.classificationId, classifications.id))
      .where(createdWithin(range, filter))
      .orderBy(asc(textUnits.createdAt), asc(textUnits.id));

    return rows.map((row) => ({
      unitId: row.unitId,
      platform: row.platform,
      createdAt: row.createdAt,
      vector: pickVector(row.classification),
    }));
  }

  async queryPeriodAggregate(dimension: DimensionKey, range: DayRange): Promise<PeriodAggregateRow[]> {
    const rows = await this.db
      .select({
        day: periodAggregates.day,
        meanScore: periodAggregates.meanScore,
        count: periodAggregates.unitCount,
      })
      .from(periodAggregates)
      .where(
        and(
          eq(periodAggregates.dimension, dimension),
          gte(periodAggregates.day, range.start),
          lte(periodAggregates.day, range.end),
        ),
      )
      .orderBy(asc(periodAggregates.day));
    return rows.map((row) => ({ ...row, dimension }));
  }

  async replacePeriodAggregates(range: DayRange, rows: readonly PeriodAggregateRow[]): Promise<void> {
    await this.db
      .delete(periodAggregates)
      .where(and(gte(periodAggregates.day, range.start), lte(periodAggregates.day, range.end)));
    if (rows.length === 0) return;
    await this.db.insert(periodAggregates).values(
      rows.map((row) => ({
        day: row.day,
        dimension: row.dimension,
        meanScore: row.meanScore,
        unitCount: row.count,
      })),
    );
  }

  async saveBaseline(row: BaselineRow): Promise<void> {
    await this.db
      .insert(baselineDistributions)
      .values(row)
      .onConflictDoUpdate({
        target: [baselineDistributions.dimension, baselineDistributions.windowStart, baselineDistributions.windowEnd],
        set: {
          mean: row.mean,
          std: row.std,
          p50: row.p50,
          p75: row.p75,
          p90: row.p90,
          p95: row.p95,
          p99: row.p99,
          max: row.max,
          n: row.n,
          computedAt: new Date(),
        },
      });
  }

  async getLatestBaseline(dimension: DimensionKey): Promise<BaselineRow | null> {
    const rows = await this.db
      .select()
      .from(baselineDistributions)
      .where(eq(baselineDistributions.dimension, dimension))
      .orderBy(desc(baselineDistributions.computedAt))
      .limit(1);
    const row = rows[0];
    if (!row) return null;
    return {
      dimension,
      windowStart: row.windowStart,
      windowEnd: row.windowEnd,
      mean: row.mean,
      std: row.std,
      p50: row.p50,
      p75: row.p75,
      p90: row.p90,
      p95: row.p95,
      p99: row.p99,
      max: row.max,
      n: row.n,
    };
  }

  async replaceCoherenceSamples(range: DayRange, rows: readonly CoherenceSampleRow[]): Promise<void> {
    await this.db
      .delete(coherenceSamples)
      .where(and(gte(coherenceSamples.day, range.start), lte(coherenceSamples.day, range.end)));
    if (rows.length === 0) return;
    await this.db.insert(coherenceSamples).values([...rows]);
  }

  async listCoherenceSamples(range: DayRange): Promise<CoherenceSampleRow[]> {
    return this.db
      .select({
        day: coherenceSamples.day,
        coherenceScore: coherenceSamples.coherenceScore,
        asymmetryScore: coherenceSamples.asymmetryScore,
        eventCoherenceIndex: coherenceSamples.eventCoherenceIndex,
      })
      .from(coherenceSamples)
      .where(and(gte(coherenceSamples.day, range.start), lte(coherenceSamples.day, range.end)))
      .orderBy(asc(coherenceSamples.day));
  }

  async wordsByDimension(dimension: DimensionKey, query: WordQuery): Promise<WordDimensionRow[]> {
    const column = DIMENSION_COLUMNS[dimension];
    return this.db
      .select({
        word: wordTokens.wordLower,
        frequency: sql<number>`count(*)::int`,
        meanScore: sql<number>`avg(${column})::float8`,
      })
      .from(wordTokens)
      .innerJoin(classifications, eq(wordTokens.classificationId, classifications.id))
      .where(
        and(
          query.minScore !== undefined ? gte(column, query.minScore) : undefined,
          query.maxScore !== undefined ? lte(column, query.maxScore) : undefined,
        ),
      )
      .groupBy(wordTokens.wordLower)
      .orderBy(desc(sql`count(*)`), asc(wordTokens.wordLower))
      .limit(query.limit);
  }

  async transaction<T>(fn: (repo: ClassificationRepository) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DrizzleClassificationRepository(tx)));
  }
}
