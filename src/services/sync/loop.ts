/**
 * Sync Loop - One pass over every measurement family
 *
 * For each series, sequentially: read what the store holds, plan the
 * missing intervals, fetch them, transform the items and write the points.
 * A pass holds no state between runs; the store is the cursor.
 */

import { errorMessage, toFatalError } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { addDays, formatDay } from "../../utils/dates.js";
import { MEASUREMENT_FAMILIES, keySeriesOf } from "./families.js";
import { planIntervals } from "./intervals.js";
import { transformItems } from "./transform.js";

import type { RateLimitedFetcher } from "./fetcher.js";
import type { MeasurementFamily, SeriesSpec } from "./families.js";
import type { IntervalPlan } from "./intervals.js";
import type { SeriesStore } from "./store.js";
import type { CountCheck, SyncWriter, WriteResult } from "./writer.js";
import type { RawItem } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type SyncState =
  | "idle"
  | "scheduling"
  | "fetching"
  | "transforming"
  | "writing"
  | "sleeping";

const TRANSITIONS: Readonly<Record<SyncState, readonly SyncState[]>> = {
  idle: ["scheduling", "sleeping"],
  scheduling: ["fetching", "idle"],
  fetching: ["transforming"],
  transforming: ["writing"],
  writing: ["scheduling"],
  sleeping: ["scheduling", "idle"],
};

export interface SyncProgress {
  phase: SyncState;
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: SyncProgress) => void;

export interface SeriesSyncResult {
  measurement: string;
  series: string;
  intervals: number;
  gapDetected: boolean;
  items: number;
  points: number;
  write: WriteResult;
}

export interface PassSummary {
  startedAt: Date;
  finishedAt: Date;
  series: SeriesSyncResult[];
  totals: {
    items: number;
    points: number;
    inserted: number;
    updated: number;
    skipped: number;
  };
}

export interface SeriesPlan {
  family: MeasurementFamily;
  series: SeriesSpec;
  first: Date | null;
  last: Date | null;
  plan: IntervalPlan;
}

export interface SyncLoopOptions {
  fetcher: RateLimitedFetcher;
  writer: SyncWriter;
  store: SeriesStore;
  families?: readonly MeasurementFamily[];
  maxSpanDays?: number;
  /** Skip writes whose point count already matches the store */
  skipUnchangedCounts?: boolean;
  now?: () => Date;
}

/**
 * A pass ended early because its stop signal aborted. Series finished
 * before the stop are written.
 */
export class PassStoppedError extends Error {
  code = "PASS_STOPPED" as const;

  constructor(
    public completedSeries: number,
    options?: ErrorOptions
  ) {
    super(`Sync pass stopped after ${String(completedSeries)} series`, options);
    this.name = "PassStoppedError";
  }
}

export class InvalidTransitionError extends Error {
  code = "INVALID_TRANSITION" as const;

  constructor(
    public from: SyncState,
    public to: SyncState
  ) {
    super(`Invalid sync state transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

// ============================================================================
// Sync Loop
// ============================================================================

export class SyncLoop {
  private state: SyncState = "idle";
  private memberSince: Date | null = null;
  private onProgress?: ProgressCallback;

  private readonly fetcher: RateLimitedFetcher;
  private readonly writer: SyncWriter;
  private readonly store: SeriesStore;
  private readonly families: readonly MeasurementFamily[];
  private readonly maxSpanDays: number;
  private readonly skipUnchangedCounts: boolean;
  private readonly now: () => Date;

  constructor(options: SyncLoopOptions) {
    this.fetcher = options.fetcher;
    this.writer = options.writer;
    this.store = options.store;
    this.families = options.families ?? MEASUREMENT_FAMILIES;
    this.maxSpanDays = options.maxSpanDays ?? 28;
    this.skipUnchangedCounts = options.skipUnchangedCounts ?? false;
    this.now = options.now ?? (() => new Date());
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  getState(): SyncState {
    return this.state;
  }

  /**
   * Create the store schema and read the member's start date. Runs once;
   * later calls are no-ops.
   */
  async initialize(signal?: AbortSignal): Promise<Date> {
    if (this.memberSince) {
      return this.memberSince;
    }
    await this.store.ensureDatabase();
    const profile = await this.fetcher.getProfile(signal);
    this.memberSince = profile.memberSince;
    syncLogger.info(
      { memberSince: formatDay(profile.memberSince) },
      "Sync initialized"
    );
    return profile.memberSince;
  }

  /**
   * Intervals every series would fetch right now, without fetching
   */
  async plan(): Promise<SeriesPlan[]> {
    const memberSince = await this.initialize();
    const plans: SeriesPlan[] = [];
    for (const family of this.families) {
      for (const series of family.series) {
        plans.push(await this.planSeries(memberSince, family, series));
      }
    }
    return plans;
  }

  /**
   * One pass over every series. When `signal` aborts, the pass stops at the
   * next series or retry wait and rejects with PassStoppedError; any other
   * failure rejects with a FatalError.
   */
  async runPass(signal?: AbortSignal): Promise<PassSummary> {
    const startedAt = this.now();
    const work = this.families.flatMap((family) =>
      family.series.map((series) => ({ family, series }))
    );
    const results: SeriesSyncResult[] = [];

    syncLogger.info({ series: work.length }, "Starting sync pass");

    try {
      const memberSince = await this.initialize(signal);
      for (const [index, { family, series }] of work.entries()) {
        signal?.throwIfAborted();
        this.transition("scheduling");
        this.report("scheduling", index, work.length, family, series);
        results.push(
          await this.syncSeries(
            memberSince,
            family,
            series,
            index,
            work.length,
            signal
          )
        );
      }
      if (this.state !== "idle") {
        this.transition("idle");
      }
    } catch (error) {
      this.state = "idle";
      if (signal?.aborted === true) {
        syncLogger.info(
          { completed: results.length, total: work.length },
          "Sync pass stopped"
        );
        throw new PassStoppedError(results.length, { cause: error });
      }
      syncLogger.error({ error: errorMessage(error) }, "Sync pass failed");
      throw toFatalError(error);
    }

    const summary = summarize(startedAt, this.now(), results);
    syncLogger.info(
      {
        series: results.length,
        ...summary.totals,
        durationMs: summary.finishedAt.getTime() - startedAt.getTime(),
      },
      "Sync pass completed"
    );
    return summary;
  }

  /** Mark the loop as waiting for its next pass */
  sleep(): void {
    this.transition("sleeping");
  }

  /** Leave the sleeping state without running a pass */
  wake(): void {
    if (this.state === "sleeping") {
      this.transition("idle");
    }
  }

  // ==========================================================================
  // Per series
  // ==========================================================================

  private async planSeries(
    memberSince: Date,
    family: MeasurementFamily,
    series: SeriesSpec
  ): Promise<SeriesPlan> {
    const key = keySeriesOf(series);
    const first = await this.store.selectBoundary(
      family.name,
      key,
      "first",
      family.precision
    );
    const last = await this.store.selectBoundary(
      family.name,
      key,
      "last",
      family.precision
    );
    const plan = planIntervals({
      memberSince,
      now: this.now(),
      first,
      last,
      maxSpanDays: this.maxSpanDays,
    });
    return { family, series, first, last, plan };
  }

  private async syncSeries(
    memberSince: Date,
    family: MeasurementFamily,
    series: SeriesSpec,
    index: number,
    total: number,
    signal?: AbortSignal
  ): Promise<SeriesSyncResult> {
    const { plan } = await this.planSeries(memberSince, family, series);
    const log = syncLogger.child({
      measurement: family.name,
      series: series.name,
    });

    log.info(
      {
        intervals: plan.intervals.length,
        gapDetected: plan.gapDetected,
        daysBeforeFirst: plan.daysBeforeFirst,
        daysSinceLast: plan.daysSinceLast,
      },
      plan.gapDetected ? "Gap detected, fetching" : "Up to date, refreshing today"
    );

    this.transition("fetching");
    this.report("fetching", index, total, family, series);
    const items: RawItem[] = [];
    for (const interval of plan.intervals) {
      items.push(
        ...(await this.fetcher.fetch(family, series, interval, signal))
      );
    }

    this.transition("transforming");
    this.report("transforming", index, total, family, series);
    const points = transformItems(family, series, items);

    this.transition("writing");
    this.report("writing", index, total, family, series);
    const firstInterval = plan.intervals[0];
    const lastInterval = plan.intervals[plan.intervals.length - 1];
    const write = await this.writer.write(points, {
      precision: family.precision,
      countCheck: this.countCheckFor(family, series, plan),
      interval:
        firstInterval && lastInterval
          ? {
              start: formatDay(firstInterval.start),
              end: formatDay(lastInterval.end),
            }
          : undefined,
    });

    log.info(
      {
        items: items.length,
        points: points.length,
        inserted: write.inserted,
        updated: write.updated,
        skipped: write.skipped,
      },
      "Series synced"
    );

    return {
      measurement: family.name,
      series: series.name,
      intervals: plan.intervals.length,
      gapDetected: plan.gapDetected,
      items: items.length,
      points: points.length,
      write,
    };
  }

  private countCheckFor(
    family: MeasurementFamily,
    series: SeriesSpec,
    plan: IntervalPlan
  ): CountCheck | undefined {
    const firstInterval = plan.intervals[0];
    const lastInterval = plan.intervals[plan.intervals.length - 1];
    if (
      !this.skipUnchangedCounts ||
      plan.gapDetected ||
      !firstInterval ||
      !lastInterval
    ) {
      return undefined;
    }
    return {
      measurement: family.name,
      series: keySeriesOf(series),
      range: { from: firstInterval.start, to: addDays(lastInterval.end, 1) },
    };
  }

  // ==========================================================================
  // State
  // ==========================================================================

  private transition(next: SyncState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new InvalidTransitionError(this.state, next);
    }
    this.state = next;
  }

  private report(
    phase: SyncState,
    index: number,
    total: number,
    family: MeasurementFamily,
    series: SeriesSpec
  ): void {
    this.onProgress?.({
      phase,
      current: index + 1,
      total,
      currentItem: `${family.name}/${series.name}`,
    });
  }
}

function summarize(
  startedAt: Date,
  finishedAt: Date,
  series: SeriesSyncResult[]
): PassSummary {
  const totals = { items: 0, points: 0, inserted: 0, updated: 0, skipped: 0 };
  for (const result of series) {
    totals.items += result.items;
    totals.points += result.points;
    totals.inserted += result.write.inserted;
    totals.updated += result.write.updated;
    totals.skipped += result.write.skipped ? 1 : 0;
  }
  return { startedAt, finishedAt, series, totals };
}

// ============================================================================
// Pass Scheduler
// ============================================================================

/**
 * Runs a pass, then waits `intervalMs` before the next one, until stopped
 * or until a pass fails.
 */
export class PassScheduler {
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private settle: {
    resolve: () => void;
    reject: (error: unknown) => void;
  } | null = null;

  constructor(
    private readonly loop: SyncLoop,
    private readonly intervalMs: number,
    private readonly onPass?: (summary: PassSummary) => void
  ) {}

  /**
   * Resolves once `stop()` is called and the pass in flight, if any, has
   * stopped; rejects with the error of the first failed pass.
   */
  start(): Promise<void> {
    if (this.settle) {
      return Promise.reject(new Error("Pass scheduler is already running"));
    }
    const controller = new AbortController();
    this.controller = controller;

    return new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };

      const tick = (): void => {
        this.timer = null;
        this.loop.runPass(controller.signal).then(
          (summary) => {
            try {
              this.onPass?.(summary);
            } catch (error) {
              this.finish(error);
              return;
            }
            if (controller.signal.aborted) {
              this.finish();
              return;
            }
            this.loop.sleep();
            syncLogger.info(
              {
                nextPassAt: new Date(Date.now() + this.intervalMs).toISOString(),
              },
              "Sleeping until next pass"
            );
            this.timer = setTimeout(tick, this.intervalMs);
          },
          (error: unknown) => {
            this.finish(error instanceof PassStoppedError ? undefined : error);
          }
        );
      };

      tick();
    });
  }

  /**
   * Ask the scheduler to stop. A sleeping scheduler stops at once; a pass in
   * flight stops at its next series or retry wait, and `start()` settles
   * after it.
   */
  stop(): void {
    if (!this.controller) {
      return;
    }
    this.controller.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.loop.wake();
      this.finish();
    }
  }

  isRunning(): boolean {
    return this.settle !== null;
  }

  private finish(error?: unknown): void {
    const settle = this.settle;
    this.settle = null;
    this.controller = null;
    if (error === undefined) {
      settle?.resolve();
    } else {
      settle?.reject(error);
    }
  }
}
