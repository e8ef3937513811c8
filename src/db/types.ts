import type { ColumnType, Generated, Insertable, Selectable } from "kysely";

// ============================================================================
// Tables
// ============================================================================

/**
 * One observation of one series. Identity is (measurement, series, time);
 * `time` is stored already truncated to the family's precision.
 */
export interface SeriesPointsTable {
  measurement: string;
  series: string;
  time: ColumnType<Date, Date, Date>;
  /** Numeric value; null when the source value was not a number */
  value: number | null;
  /** Original text of a value that did not coerce to a number */
  value_text: string | null;
  tags: Record<string, string>;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

// ============================================================================
// Database
// ============================================================================

export interface Database {
  series_points: SeriesPointsTable;
}

export type SeriesPointRow = Selectable<SeriesPointsTable>;
export type NewSeriesPoint = Insertable<SeriesPointsTable>;
