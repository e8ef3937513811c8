/**
 * Interval Scheduler - Decides which day ranges a series still needs
 *
 * Two gaps are closed per series: the member's history before the first
 * stored day, and the days since the last stored day. Each gap is split
 * into requests no longer than the source's per-request span. A series
 * with no gap still gets today's data so it keeps moving forward.
 */

import { addDays, diffInDays, startOfUtcDay } from "../../utils/dates.js";

import type { SyncInterval } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface IntervalPlanInput {
  memberSince: Date;
  now: Date;
  /** Earliest stored timestamp of the key series, null when empty */
  first: Date | null;
  /** Latest stored timestamp of the key series, null when empty */
  last: Date | null;
  /** Longest range, in days, one request may cover */
  maxSpanDays: number;
}

export interface IntervalPlan {
  intervals: SyncInterval[];
  /** False when the only interval is the keep-alive fetch of today */
  gapDetected: boolean;
  /** Days between the member's start and the first stored day */
  daysBeforeFirst: number;
  /** Days between the last stored day and today */
  daysSinceLast: number;
}

// ============================================================================
// Chunking
// ============================================================================

/**
 * Split the inclusive day range [start, end] into consecutive chunks of at
 * most `maxSpanDays` days. The last chunk ends exactly on `end`.
 */
export function splitRange(
  start: Date,
  end: Date,
  maxSpanDays: number
): SyncInterval[] {
  if (!Number.isInteger(maxSpanDays) || maxSpanDays < 1) {
    throw new RangeError(
      `maxSpanDays must be a positive integer, got ${String(maxSpanDays)}`
    );
  }

  const chunks: SyncInterval[] = [];
  const last = startOfUtcDay(end);
  let cursor = startOfUtcDay(start);

  while (cursor.getTime() <= last.getTime()) {
    const chunkEnd = addDays(cursor, maxSpanDays - 1);
    const clipped = chunkEnd.getTime() > last.getTime() ? last : chunkEnd;
    chunks.push({ start: cursor, end: clipped });
    cursor = addDays(clipped, 1);
  }

  return chunks;
}

// ============================================================================
// Planning
// ============================================================================

export function planIntervals(input: IntervalPlanInput): IntervalPlan {
  const today = startOfUtcDay(input.now);
  const memberSince = startOfUtcDay(input.memberSince);
  const isEmpty = input.first === null || input.last === null;

  // An empty series counts as starting and ending today: the history gap
  // then spans everything and the recent gap is empty.
  const firstDay = input.first === null ? today : startOfUtcDay(input.first);
  const lastDay = input.last === null ? today : startOfUtcDay(input.last);

  const daysBeforeFirst = diffInDays(memberSince, firstDay);
  const daysSinceLast = diffInDays(lastDay, today);

  const intervals: SyncInterval[] = [];

  if (daysBeforeFirst > 1) {
    // Full backfill includes today; otherwise stop short of the first stored day
    const historyEnd = isEmpty ? today : addDays(firstDay, -1);
    intervals.push(...splitRange(memberSince, historyEnd, input.maxSpanDays));
  }

  if (daysSinceLast > 1) {
    // The last stored day is fetched again: it may have been written partial
    intervals.push(...splitRange(lastDay, today, input.maxSpanDays));
  }

  if (intervals.length === 0) {
    return {
      intervals: [{ start: today, end: today }],
      gapDetected: false,
      daysBeforeFirst,
      daysSinceLast,
    };
  }

  return { intervals, gapDetected: true, daysBeforeFirst, daysSinceLast };
}

/**
 * Number of days covered by an inclusive interval
 */
export function intervalLength(interval: SyncInterval): number {
  return diffInDays(interval.start, interval.end) + 1;
}
