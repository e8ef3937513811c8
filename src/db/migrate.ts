import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";
import { PostgresSeriesStore } from "../services/sync/store.js";

import type { Database } from "./types.js";

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create the schema and the series table. With `fresh`, the schema and
 * everything stored in it are dropped first.
 */
export async function runMigration(
  db: Kysely<Database>,
  schema: string,
  options?: { fresh?: boolean }
): Promise<void> {
  if (options?.fresh === true) {
    dbLogger.info({ schema }, "Dropping existing schema (--fresh mode)...");
    await db.schema.dropSchema(schema).ifExists().cascade().execute();
  }

  dbLogger.info({ schema }, "Running schema migration...");
  await new PostgresSeriesStore(db, schema).ensureDatabase();
  dbLogger.info({ schema }, "Schema migration completed successfully");
}

/**
 * Check if the schema exists (has tables)
 */
export async function hasSchema(
  db: Kysely<Database>,
  schema: string
): Promise<boolean> {
  const result = await sql<{ count: number }>`
    SELECT COUNT(*)::int as count
    FROM information_schema.tables
    WHERE table_schema = ${schema}
    AND table_type = 'BASE TABLE'
  `.execute(db);
  const row = result.rows[0];
  return row !== undefined && row.count > 0;
}

export interface TableStat {
  table_name: string;
  row_count: number;
}

/**
 * Get table statistics
 */
export async function getTableStats(
  db: Kysely<Database>,
  schema: string
): Promise<TableStat[]> {
  const result = await sql<TableStat>`
    SELECT
      relname as table_name,
      n_live_tup::bigint as row_count
    FROM pg_stat_user_tables
    WHERE schemaname = ${schema}
    ORDER BY relname
  `.execute(db);
  return result.rows;
}
