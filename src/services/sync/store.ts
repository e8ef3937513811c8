/**
 * Series Store - Postgres persistence of time-series points
 *
 * All points live in one `series_points` table inside the configured schema.
 * Writes are upserts on (measurement, series, time), so replaying an
 * interval updates rows instead of duplicating them.
 */

import { sql, type Kysely } from "kysely";

import { dbLogger } from "../../logger.js";
import { jsonb } from "../../db/connection.js";

import type { Database, NewSeriesPoint } from "../../db/types.js";
import type { TimePrecision, TimeSeriesPoint } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type Boundary = "first" | "last";

/** Half-open time range: from <= time < to */
export interface CountRange {
  from: Date;
  to: Date;
}

export interface BatchWriteResult {
  success: boolean;
  inserted: number;
  updated: number;
}

export interface SeriesStore {
  /** Create the schema and table when missing */
  ensureDatabase(): Promise<void>;
  listMeasurements(): Promise<string[]>;
  /** Earliest or latest stored timestamp of a series, null when empty */
  selectBoundary(
    measurement: string,
    series: string,
    boundary: Boundary,
    precision: TimePrecision
  ): Promise<Date | null>;
  /** Number of non-null values of a series */
  countValues(
    measurement: string,
    series: string,
    range?: CountRange
  ): Promise<number>;
  /** Write one batch atomically */
  writeBatch(
    points: readonly TimeSeriesPoint[],
    precision: TimePrecision
  ): Promise<BatchWriteResult>;
}

// ============================================================================
// Precision
// ============================================================================

const PRECISION_MS: Record<TimePrecision, number> = {
  s: 1000,
  h: 3_600_000,
};

/**
 * Floor a timestamp to whole seconds or whole hours (UTC)
 */
export function truncateToPrecision(
  timestamp: Date,
  precision: TimePrecision
): Date {
  const step = PRECISION_MS[precision];
  return new Date(Math.floor(timestamp.getTime() / step) * step);
}

export function toRow(
  point: TimeSeriesPoint,
  precision: TimePrecision
): NewSeriesPoint {
  const { value } = point;
  const numeric = typeof value === "number";
  return {
    measurement: point.measurement,
    series: point.series,
    time: truncateToPrecision(point.timestamp, precision),
    value: numeric ? value : null,
    value_text: numeric ? null : String(value),
    tags: point.tags,
  };
}

// ============================================================================
// Postgres store
// ============================================================================

export class PostgresSeriesStore implements SeriesStore {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly schema: string
  ) {}

  async ensureDatabase(): Promise<void> {
    await this.db.schema.createSchema(this.schema).ifNotExists().execute();

    await this.db.schema
      .withSchema(this.schema)
      .createTable("series_points")
      .ifNotExists()
      .addColumn("measurement", "text", (col) => col.notNull())
      .addColumn("series", "text", (col) => col.notNull())
      .addColumn("time", "timestamptz", (col) => col.notNull())
      .addColumn("value", "double precision")
      .addColumn("value_text", "text")
      .addColumn("tags", "jsonb", (col) =>
        col.notNull().defaultTo(sql`'{}'::jsonb`)
      )
      .addColumn("created_at", "timestamptz", (col) =>
        col.notNull().defaultTo(sql`now()`)
      )
      .addColumn("updated_at", "timestamptz", (col) =>
        col.notNull().defaultTo(sql`now()`)
      )
      .addPrimaryKeyConstraint("series_points_pkey", [
        "measurement",
        "series",
        "time",
      ])
      .execute();

    dbLogger.debug({ schema: this.schema }, "Series table ready");
  }

  async listMeasurements(): Promise<string[]> {
    const rows = await this.points()
      .select("measurement")
      .distinct()
      .orderBy("measurement")
      .execute();
    return rows.map((row) => row.measurement);
  }

  async selectBoundary(
    measurement: string,
    series: string,
    boundary: Boundary,
    precision: TimePrecision
  ): Promise<Date | null> {
    const row = await this.points()
      .select("time")
      .where("measurement", "=", measurement)
      .where("series", "=", series)
      .where((eb) =>
        eb.or([eb("value", "is not", null), eb("value_text", "is not", null)])
      )
      .orderBy("time", boundary === "first" ? "asc" : "desc")
      .limit(1)
      .executeTakeFirst();

    return row ? truncateToPrecision(new Date(row.time), precision) : null;
  }

  async countValues(
    measurement: string,
    series: string,
    range?: CountRange
  ): Promise<number> {
    let query = this.points()
      .select((eb) => eb.fn.countAll<number>().as("count"))
      .where("measurement", "=", measurement)
      .where("series", "=", series)
      .where((eb) =>
        eb.or([eb("value", "is not", null), eb("value_text", "is not", null)])
      );

    if (range) {
      query = query
        .where("time", ">=", range.from)
        .where("time", "<", range.to);
    }

    const row = await query.executeTakeFirst();
    return Number(row?.count ?? 0);
  }

  async writeBatch(
    points: readonly TimeSeriesPoint[],
    precision: TimePrecision
  ): Promise<BatchWriteResult> {
    if (points.length === 0) {
      return { success: true, inserted: 0, updated: 0 };
    }

    const rows = points.map((point) => {
      const row = toRow(point, precision);
      return { ...row, tags: jsonb(row.tags) };
    });

    const result = await this.db
      .withSchema(this.schema)
      .insertInto("series_points")
      .values(rows)
      .onConflict((oc) =>
        oc.columns(["measurement", "series", "time"]).doUpdateSet((eb) => ({
          value: eb.ref("excluded.value"),
          value_text: eb.ref("excluded.value_text"),
          tags: eb.ref("excluded.tags"),
          updated_at: sql<Date>`now()`,
        }))
      )
      // xmax = 0 means INSERT, xmax > 0 means UPDATE
      .returning(sql<string>`xmax::text`.as("xmax"))
      .execute();

    const inserted = result.filter((row) => row.xmax === "0").length;
    return {
      success: result.length === rows.length,
      inserted,
      updated: result.length - inserted,
    };
  }

  private points() {
    return this.db.withSchema(this.schema).selectFrom("series_points");
  }
}
