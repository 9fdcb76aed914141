/**
 * Text Unit Classifications Schema
 *
 * Links each text unit to its classification. The unit ID is the primary
 * key, so a unit is classified at most once and relinking is a no-op.
 */

import { pgTable, text, integer, timestamp, index } from "drizzle-orm/pg-core";
import { textUnits } from "./text-units.ts";
import { classifications } from "./classifications.ts";

export const textUnitClassifications = pgTable(
  "text_unit_classifications",
  {
    /** FK to text_units.id */
    unitId: text("unit_id")
      .primaryKey()
      .references(() => textUnits.id),

    /** FK to classifications.id */
    classificationId: integer("classification_id")
      .references(() => classifications.id)
      .notNull(),

    /** When the link was written */
    classifiedAt: timestamp("classified_at").defaultNow().notNull(),
  },
  (table) => [
    index("text_unit_classifications_classification_idx").on(table.classificationId),
  ],
);
