import { Kysely, PostgresDialect, sql, type RawBuilder } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// Configure pg to parse JSON/JSONB as objects instead of strings
types.setTypeParser(
  types.builtins.JSON,
  (val: string) => JSON.parse(val) as unknown
);
types.setTypeParser(
  types.builtins.JSONB,
  (val: string) => JSON.parse(val) as unknown
);

// count(*) and other int8 results come back as strings by default
types.setTypeParser(types.builtins.INT8, (val: string) => Number(val));

/**
 * Helper to convert JavaScript objects to JSONB SQL expressions for Kysely inserts/updates.
 * This is needed because Kysely doesn't automatically serialize objects to JSON for PostgreSQL.
 */
export function jsonb<T>(value: T): RawBuilder<T> {
  return sql<T>`${JSON.stringify(value)}::jsonb`;
}

// ============================================================================
// Connection
// ============================================================================

export interface DatabaseConnection {
  db: Kysely<Database>;
  pool: pg.Pool;
  close(): Promise<void>;
}

/**
 * Open a pool and a Kysely instance on top of it.
 *
 * The sync loop sleeps for hours between passes; idle connections are
 * closed after a few seconds so none is held across a sleep.
 */
export function createConnection(databaseUrl: string): DatabaseConnection {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 4,
    idleTimeoutMillis: 5000,
    connectionTimeoutMillis: 5000,
  });

  pool.on("error", (error) => {
    dbLogger.error({ error: error.message }, "Idle database client failed");
  });

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });

  return {
    db,
    pool,
    async close(): Promise<void> {
      try {
        // db.destroy() already closes the pool, so we only need to call it once
        await db.destroy();
        dbLogger.info("Database connection closed");
      } catch (error) {
        dbLogger.error({ error }, "Error closing database connection");
        throw error;
      }
    },
  };
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(pool: pg.Pool): Promise<boolean> {
  try {
    await pool.query("SELECT 1");
    return true;
  } catch (error) {
    dbLogger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      "Database health check failed"
    );
    return false;
  }
}

/**
 * Get the database URL for display, with password masked
 */
export function maskDatabaseUrl(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    if (url.password !== "") {
      url.password = "****";
    }
    return url.toString();
  } catch {
    return "<invalid url>";
  }
}

/**
 * Get pool statistics
 */
export function getPoolStats(pool: pg.Pool): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
