/**
 * Derived Tables Schema
 *
 * Period aggregates, baseline distributions and coherence samples. All
 * three are rebuilt by recomputation and never edited by hand.
 */

import { pgTable, text, integer, doublePrecision, date, timestamp, primaryKey } from "drizzle-orm/pg-core";

export const periodAggregates = pgTable(
  "period_aggregates",
  {
    /** UTC day (YYYY-MM-DD) */
    day: date("day", { mode: "string" }).notNull(),

    /** Dimension key (camelCase, as in DimensionVector) */
    dimension: text("dimension").notNull(),

    meanScore: doublePrecision("mean_score").notNull(),

    /** Units contributing to the mean */
    unitCount: integer("unit_count").notNull(),

    computedAt: timestamp("computed_at").defaultNow().notNull(),
  },
  (table) => [primaryKey({ columns: [table.day, table.dimension] })],
);

export const baselineDistributions = pgTable(
  "baseline_distributions",
  {
    dimension: text("dimension").notNull(),

    /** Reference window, inclusive */
    windowStart: date("window_start", { mode: "string" }).notNull(),
    windowEnd: date("window_end", { mode: "string" }).notNull(),

    mean: doublePrecision("mean").notNull(),
    std: doublePrecision("std").notNull(),
    p50: doublePrecision("p50").notNull(),
    p75: doublePrecision("p75").notNull(),
    p90: doublePrecision("p90").notNull(),
    p95: doublePrecision("p95").notNull(),
    p99: doublePrecision("p99").notNull(),
    max: doublePrecision("max").notNull(),

    /** Daily observations in the window */
    n: integer("n").notNull(),

    computedAt: timestamp("computed_at").defaultNow().notNull(),
  },
  (table) => [primaryKey({ columns: [table.dimension, table.windowStart, table.windowEnd] })],
);

export const coherenceSamples = pgTable("coherence_samples", {
  /** UTC day (YYYY-MM-DD) */
  day: date("day", { mode: "string" }).primaryKey(),

  /** Synchronization score, [0,1] */
  coherenceScore: doublePrecision("coherence_score").notNull(),

  /** Raw (unnormalized) asymmetry; null at series edges */
  asymmetryScore: doublePrecision("asymmetry_score"),

  /** Smoothed composite; null where the smoothing window is incomplete */
  eventCoherenceIndex: doublePrecision("event_coherence_index"),

  computedAt: timestamp("computed_at").defaultNow().notNull(),
});
