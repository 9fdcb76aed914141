/**
 * Word Tokens Schema
 *
 * Every word occurrence of a classified unit, tagged with the unit's
 * classification for word-level lookups. (unit, position) is unique so a
 * redone chunk inserts nothing twice.
 */

import { pgTable, text, integer, bigint, index, unique } from "drizzle-orm/pg-core";
import { textUnits } from "./text-units.ts";
import { classifications } from "./classifications.ts";

export const wordTokens = pgTable(
  "word_tokens",
  {
    /** Auto-generated ID */
    id: bigint("id", { mode: "number" }).primaryKey().generatedAlwaysAsIdentity(),

    /** FK to text_units.id */
    unitId: text("unit_id")
      .references(() => textUnits.id)
      .notNull(),

    /** Word as written */
    wordText: text("word_text").notNull(),

    /** Lower-cased form for searching */
    wordLower: text("word_lower").notNull(),

    /** 0-based word index within the unit */
    position: integer("position").notNull(),

    /** FK to classifications.id (inherited from the unit) */
    classificationId: integer("classification_id")
      .references(() => classifications.id)
      .notNull(),
  },
  (table) => [
    unique("word_tokens_unit_position_unique").on(table.unitId, table.position),
    index("word_tokens_lower_idx").on(table.wordLower),
    index("word_tokens_classification_idx").on(table.classificationId),
  ],
);
