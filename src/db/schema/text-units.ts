/**
 * Text Units Schema
 *
 * The immutable input records: one post or comment per row. Written by the
 * ingestion side, only read here.
 */

import { pgTable, text, timestamp, index } from "drizzle-orm/pg-core";

export const textUnits = pgTable(
  "text_units",
  {
    /** Source-assigned ID */
    id: text("id").primaryKey(),

    /** Source platform (e.g. "hackernews", "reddit") */
    platform: text("platform").notNull(),

    /** Parent unit or thread reference, if any */
    parentId: text("parent_id"),

    /** When the unit was published (UTC) */
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull(),

    /** Raw text */
    body: text("body").notNull(),
  },
  (table) => [
    index("text_units_created_at_idx").on(table.createdAt),
    index("text_units_platform_idx").on(table.platform),
  ],
);
