/**
 * Classifications Schema
 *
 * One row per distinct rounded dimension vector. Append-only; the unique
 * constraint over all twelve components makes concurrent inserts of the
 * same vector collapse to one row.
 */

import { pgTable, integer, doublePrecision, timestamp, unique } from "drizzle-orm/pg-core";

export const classifications = pgTable(
  "classifications",
  {
    /** Auto-generated ID */
    id: integer("id").primaryKey().generatedAlwaysAsIdentity(),

    certaintyCollapse: doublePrecision("certainty_collapse").notNull(),
    pronounFirst: doublePrecision("pronoun_first").notNull(),
    pronounThird: doublePrecision("pronoun_third").notNull(),
    pronounCollective: doublePrecision("pronoun_collective").notNull(),
    emotionalValence: doublePrecision("emotional_valence").notNull(),
    temporalBleed: doublePrecision("temporal_bleed").notNull(),
    timeCompression: doublePrecision("time_compression").notNull(),
    sacredProfane: doublePrecision("sacred_profane").notNull(),
    temporalProximity: doublePrecision("temporal_proximity").notNull(),
    agencyReversal: doublePrecision("agency_reversal").notNull(),
    metaphorDensity: doublePrecision("metaphor_density").notNull(),
    novelMeme: doublePrecision("novel_meme").notNull(),

    /** When the vector was first seen */
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    /** Identical rounded vectors share one row */
    unique("classifications_vector_unique").on(
      table.certaintyCollapse,
      table.pronounFirst,
      table.pronounThird,
      table.pronounCollective,
      table.emotionalValence,
      table.temporalBleed,
      table.timeCompression,
      table.sacredProfane,
      table.temporalProximity,
      table.agencyReversal,
      table.metaphorDensity,
      table.novelMeme,
    ),
  ],
);
