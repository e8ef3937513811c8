/**
 * Sync Writer - Dedup, batch and persist transformed points
 */

import { WriteFailureError, errorMessage } from "../../errors.js";
import { dbLogger } from "../../logger.js";
import { truncateToPrecision } from "./store.js";

import type { BatchWriteResult, CountRange, SeriesStore } from "./store.js";
import type { TimePrecision, TimeSeriesPoint } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_BATCH_SIZE = 2500;

/**
 * Skip the write when the store already holds as many values of this series
 * as the batch carries. A heuristic: equal counts do not mean equal values.
 */
export interface CountCheck {
  measurement: string;
  series: string;
  range?: CountRange;
}

export interface WriteOptions {
  precision: TimePrecision;
  countCheck?: CountCheck;
  batchSize?: number;
  /** Fetched day range, reported when a batch fails */
  interval?: { start: string; end: string };
}

export interface WriteResult {
  /** Points handed to the writer */
  received: number;
  /** Points dropped as duplicates of a later point */
  deduplicated: number;
  /** Points sent to the store */
  written: number;
  inserted: number;
  updated: number;
  batches: number;
  skipped: boolean;
}

export interface SyncWriterOptions {
  store: SeriesStore;
  batchSize?: number;
}

// ============================================================================
// Dedup
// ============================================================================

function identityKey(point: TimeSeriesPoint): string {
  return `${point.measurement}\u0000${point.series}\u0000${String(point.timestamp.getTime())}`;
}

/**
 * Drop points sharing (measurement, series, timestamp) after truncation to
 * `precision`; the last one in input order wins and takes the first one's
 * position.
 */
export function dedupePoints(
  points: readonly TimeSeriesPoint[],
  precision: TimePrecision
): TimeSeriesPoint[] {
  const byIdentity = new Map<string, TimeSeriesPoint>();
  for (const point of points) {
    const truncated = {
      ...point,
      timestamp: truncateToPrecision(point.timestamp, precision),
    };
    byIdentity.set(identityKey(truncated), truncated);
  }
  return [...byIdentity.values()];
}

function seriesLabel(points: readonly TimeSeriesPoint[]): {
  measurement: string;
  series: string;
} {
  const measurements = new Set(points.map((point) => point.measurement));
  const series = new Set(points.map((point) => point.series));
  return {
    measurement: [...measurements].join(","),
    series:
      series.size > 3 ? `${String(series.size)} series` : [...series].join(","),
  };
}

// ============================================================================
// Writer
// ============================================================================

export class SyncWriter {
  private readonly store: SeriesStore;
  private readonly batchSize: number;

  constructor(options: SyncWriterOptions) {
    this.store = options.store;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async write(
    points: readonly TimeSeriesPoint[],
    options: WriteOptions
  ): Promise<WriteResult> {
    const unique = dedupePoints(points, options.precision);
    const result: WriteResult = {
      received: points.length,
      deduplicated: points.length - unique.length,
      written: 0,
      inserted: 0,
      updated: 0,
      batches: 0,
      skipped: false,
    };

    if (unique.length === 0) {
      return result;
    }

    if (
      options.countCheck &&
      (await this.isUnchanged(unique, options.countCheck))
    ) {
      dbLogger.debug(
        { ...options.countCheck, points: unique.length },
        "Stored count matches, skipping write"
      );
      return { ...result, skipped: true };
    }

    const batchSize = options.batchSize ?? this.batchSize;
    const label = seriesLabel(unique);

    for (let offset = 0; offset < unique.length; offset += batchSize) {
      const batch = unique.slice(offset, offset + batchSize);
      const context = {
        ...label,
        interval: options.interval,
        batchIndex: result.batches,
        batchSize: batch.length,
        totalPoints: unique.length,
      };

      let outcome: BatchWriteResult;
      try {
        outcome = await this.store.writeBatch(batch, options.precision);
      } catch (error) {
        dbLogger.error(
          { ...context, error: errorMessage(error) },
          "Batch write failed"
        );
        throw new WriteFailureError(
          `Writing ${label.measurement} batch ${String(context.batchIndex)} failed: ${errorMessage(error)}`,
          context,
          { cause: error }
        );
      }

      if (!outcome.success) {
        dbLogger.error(context, "Batch write rejected by store");
        throw new WriteFailureError(
          `Store rejected ${label.measurement} batch ${String(context.batchIndex)}`,
          context
        );
      }

      result.batches++;
      result.written += batch.length;
      result.inserted += outcome.inserted;
      result.updated += outcome.updated;
    }

    dbLogger.debug(
      {
        ...label,
        written: result.written,
        inserted: result.inserted,
        updated: result.updated,
        batches: result.batches,
      },
      "Points written"
    );

    return result;
  }

  private async isUnchanged(
    points: readonly TimeSeriesPoint[],
    check: CountCheck
  ): Promise<boolean> {
    const expected = points.filter(
      (point) =>
        point.measurement === check.measurement && point.series === check.series
    ).length;
    if (expected === 0) {
      return false;
    }
    const stored = await this.store.countValues(
      check.measurement,
      check.series,
      check.range
    );
    return stored === expected;
  }
}
