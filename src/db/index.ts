import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { sql } from "drizzle-orm";
import pg from "pg";
import { ConfigurationError } from "../lib/errors.ts";
import * as schema from "./schema/index.ts";

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  /** Round-trip a trivial query; throws when the pool cannot connect */
  ping(): Promise<void>;
  /** Drain and close the pool */
  close(): Promise<void>;
}

/**
 * Open a pg Pool and wrap it in drizzle. The caller owns the handle and
 * must `close()` it when the run ends.
 */
export function openDatabase(url: string): DatabaseHandle {
  if (!url) {
    throw new ConfigurationError("DATABASE_URL is not set");
  }

  const pool = new pg.Pool({ connectionString: url });
  const db = drizzle(pool, { schema });

  return {
    db,
    async ping() {
      await db.execute(sql`select 1`);
    },
    close: () => pool.end(),
  };
}
