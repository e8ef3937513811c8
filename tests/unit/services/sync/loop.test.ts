import { describe, it, expect, vi } from "vitest";

import {
  FetchAbortedError,
  RateLimitExceededError,
  SourceRequestError,
  UnexpectedError,
  WriteFailureError,
} from "../../../../src/errors.js";
import {
  MEASUREMENT_FAMILIES,
  findFamily,
} from "../../../../src/services/sync/families.js";
import {
  RateLimitedFetcher,
  type Sleep,
} from "../../../../src/services/sync/fetcher.js";
import {
  InvalidTransitionError,
  PassScheduler,
  PassStoppedError,
  SyncLoop,
  type PassSummary,
  type SyncState,
} from "../../../../src/services/sync/loop.js";
import { SyncWriter } from "../../../../src/services/sync/writer.js";
import { formatDay } from "../../../../src/utils/dates.js";
import { stepsPayload } from "../../../fixtures/fitbit.js";
import { InMemoryCredentialStore } from "../../../mocks/credential-store.js";
import { InMemorySeriesStore } from "../../../mocks/series-store.js";
import { ScriptedSourceClient } from "../../../mocks/source-client.js";

import type { MeasurementFamily } from "../../../../src/services/sync/families.js";

const MEMBER_SINCE = new Date("2020-01-01T00:00:00.000Z");
const NOW = new Date("2020-01-05T12:00:00.000Z");

function stepsOnly(): MeasurementFamily {
  const activities = findFamily("activities");
  const steps = activities?.series.find((series) => series.name === "steps");
  if (!activities || !steps) {
    throw new Error("activities/steps is not configured");
  }
  return { ...activities, series: [steps] };
}

/** A retry wait that only ends when its signal aborts */
const waitForAbort: Sleep = (_ms, signal) =>
  new Promise<void>((_resolve, reject) => {
    if (!signal) {
      return;
    }
    const aborting = signal;
    if (aborting.aborted) {
      reject(aborting.reason);
      return;
    }
    aborting.addEventListener("abort", () => reject(aborting.reason), {
      once: true,
    });
  });

function createLoop(
  options: {
    families?: readonly MeasurementFamily[];
    skipUnchangedCounts?: boolean;
    sleep?: Sleep;
  } = {}
) {
  const client = new ScriptedSourceClient(MEMBER_SINCE);
  client.respond("activities/steps", stepsPayload);
  const store = new InMemorySeriesStore();
  const fetcher = new RateLimitedFetcher(client, new InMemoryCredentialStore(), {
    sleep: options.sleep ?? vi.fn(async () => {}),
  });
  const loop = new SyncLoop({
    fetcher,
    writer: new SyncWriter({ store }),
    store,
    families: options.families ?? [stepsOnly()],
    maxSpanDays: 28,
    skipUnchangedCounts: options.skipUnchangedCounts ?? false,
    now: () => NOW,
  });
  return { client, store, loop };
}

describe("services/sync/loop", () => {
  // ============================================================================
  // SyncLoop
  // ============================================================================

  describe("SyncLoop", () => {
    it("should backfill an empty series from the member's start to today", async () => {
      const { client, store, loop } = createLoop();

      const summary = await loop.runPass();

      expect(client.requests).toEqual([
        {
          resource: "activities/steps",
          start: "2020-01-01",
          end: "2020-01-05",
          apiVersion: "1",
        },
      ]);
      const first = await store.selectBoundary("activities", "steps", "first", "h");
      const last = await store.selectBoundary("activities", "steps", "last", "h");
      expect(first && formatDay(first)).toBe("2020-01-01");
      expect(last && formatDay(last)).toBe("2020-01-05");
      expect(summary.series).toEqual([
        expect.objectContaining({
          measurement: "activities",
          series: "steps",
          intervals: 1,
          gapDetected: true,
          items: 5,
          points: 5,
        }),
      ]);
      expect(summary.totals.inserted).toBe(5);
    });

    it("should write no new points on a second pass without new data", async () => {
      const { client, store, loop } = createLoop();
      await loop.runPass();

      const second = await loop.runPass();

      expect(client.requests[1]).toMatchObject({
        start: "2020-01-05",
        end: "2020-01-05",
      });
      expect(second.totals.inserted).toBe(0);
      expect(second.totals.updated).toBe(1);
      expect(store.seriesRows("activities", "steps")).toHaveLength(5);
    });

    it("should skip the keep-alive write when counts match and the skip is on", async () => {
      const { store, loop } = createLoop({ skipUnchangedCounts: true });
      await loop.runPass();

      const second = await loop.runPass();

      expect(second.series[0]?.write.skipped).toBe(true);
      expect(second.totals.skipped).toBe(1);
      expect(second.totals.inserted + second.totals.updated).toBe(0);
      expect(store.batches).toHaveLength(1);
    });

    it("should initialize the store and read the profile once", async () => {
      const { client, store, loop } = createLoop();

      await loop.runPass();
      await loop.runPass();

      expect(store.ensureCalls).toBe(1);
      expect(client.profileCalls).toBe(1);
    });

    it("should walk every series of every family", async () => {
      const { client, loop } = createLoop({ families: MEASUREMENT_FAMILIES });

      const summary = await loop.runPass();

      expect(summary.series).toHaveLength(30);
      expect(client.requests).toHaveLength(30);
      expect(client.requests.filter((r) => r.apiVersion === "1.2")).toEqual([
        {
          resource: "sleep",
          start: "2020-01-01",
          end: "2020-01-05",
          apiVersion: "1.2",
        },
      ]);
    });

    it("should report each phase in order and end idle", async () => {
      const { loop } = createLoop();
      const phases: SyncState[] = [];
      loop.setProgressCallback((progress) => phases.push(progress.phase));

      await loop.runPass();

      expect(phases).toEqual(["scheduling", "fetching", "transforming", "writing"]);
      expect(loop.getState()).toBe("idle");
    });

    it("should return to idle and rethrow when a fetch is aborted", async () => {
      const { client, loop } = createLoop();
      await loop.initialize();
      client.failNext(new SourceRequestError("insufficient_scope", 403));

      await expect(loop.runPass()).rejects.toBeInstanceOf(FetchAbortedError);
      expect(loop.getState()).toBe("idle");
    });

    it("should complete an empty pass", async () => {
      const { loop } = createLoop({ families: [] });

      const summary = await loop.runPass();

      expect(summary.series).toEqual([]);
      expect(loop.getState()).toBe("idle");
    });

    it("should wrap failures outside the error taxonomy", async () => {
      const { store, loop } = createLoop();
      const cause = new Error('relation "series_points" does not exist');
      vi.spyOn(store, "selectBoundary").mockRejectedValue(cause);

      const error = await loop.runPass().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedError);
      expect(error).toMatchObject({ exitCode: 1, cause });
      expect(loop.getState()).toBe("idle");
    });

    it("should report the fetched range when a write fails", async () => {
      const { store, loop } = createLoop();
      store.failOnBatch = 0;

      const error = await loop.runPass().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WriteFailureError);
      expect(error).toMatchObject({
        context: { interval: { start: "2020-01-01", end: "2020-01-05" } },
      });
    });

    it("should stop at the next series once the signal aborts", async () => {
      const { client, loop } = createLoop({
        families: MEASUREMENT_FAMILIES,
      });
      const controller = new AbortController();
      loop.setProgressCallback((progress) => {
        if (progress.phase === "writing") {
          controller.abort();
        }
      });

      const error = await loop.runPass(controller.signal).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PassStoppedError);
      expect(error).toMatchObject({ completedSeries: 1 });
      expect(client.requests).toHaveLength(1);
      expect(loop.getState()).toBe("idle");
    });

    it("should plan without fetching data", async () => {
      const { client, loop } = createLoop();

      const plans = await loop.plan();

      expect(plans).toHaveLength(1);
      expect(plans[0]?.plan.gapDetected).toBe(true);
      expect(client.requests).toEqual([]);
    });

    it("should reject transitions missing from the table", () => {
      const { loop } = createLoop();
      loop.sleep();

      expect(() => loop.sleep()).toThrow(InvalidTransitionError);
    });
  });

  // ============================================================================
  // PassScheduler
  // ============================================================================

  describe("PassScheduler", () => {
    it("should run a pass, sleep, and resolve once stopped", async () => {
      const { loop } = createLoop();
      const passes: PassSummary[] = [];
      const scheduler = new PassScheduler(loop, 60_000, (summary) =>
        passes.push(summary)
      );

      const running = scheduler.start();
      await vi.waitFor(() => {
        expect(passes).toHaveLength(1);
      });
      expect(loop.getState()).toBe("sleeping");

      scheduler.stop();

      await expect(running).resolves.toBeUndefined();
      expect(loop.getState()).toBe("idle");
      expect(scheduler.isRunning()).toBe(false);
    });

    it("should stop a pass held in a rate-limit wait before resolving", async () => {
      const { client, store, loop } = createLoop({ sleep: waitForAbort });
      await loop.initialize();
      client.failNext(new RateLimitExceededError("too many requests"));
      const scheduler = new PassScheduler(loop, 60_000);

      const running = scheduler.start();
      await vi.waitFor(() => {
        expect(client.requests).toHaveLength(1);
      });
      scheduler.stop();

      await expect(running).resolves.toBeUndefined();
      expect(client.requests).toHaveLength(1);
      expect(store.rows.size).toBe(0);
      expect(loop.getState()).toBe("idle");
      expect(scheduler.isRunning()).toBe(false);
    });

    it("should settle only after the pass in flight has stopped", async () => {
      let release = (): void => {};
      const heldWait: Sleep = () =>
        new Promise<void>((resolve) => {
          release = resolve;
        });
      const { client, store, loop } = createLoop({ sleep: heldWait });
      await loop.initialize();
      client.failNext(new RateLimitExceededError("too many requests"));
      const scheduler = new PassScheduler(loop, 60_000);

      let settled = false;
      const running = scheduler.start().then(() => {
        settled = true;
      });
      await vi.waitFor(() => {
        expect(client.requests).toHaveLength(1);
      });
      scheduler.stop();
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(settled).toBe(false);

      release();
      await running;

      expect(client.requests).toHaveLength(1);
      expect(store.rows.size).toBe(0);
      expect(loop.getState()).toBe("idle");
    });

    it("should reject when the pass callback throws", async () => {
      const { loop } = createLoop();
      const failure = new Error("display failed");
      const scheduler = new PassScheduler(loop, 60_000, () => {
        throw failure;
      });

      await expect(scheduler.start()).rejects.toBe(failure);
      expect(scheduler.isRunning()).toBe(false);
      expect(loop.getState()).toBe("idle");
    });

    it("should reject when a pass fails", async () => {
      const { client, loop } = createLoop();
      client.failNext(new SourceRequestError("invalid_client", 401));
      const scheduler = new PassScheduler(loop, 60_000);

      await expect(scheduler.start()).rejects.toBeInstanceOf(FetchAbortedError);
      expect(scheduler.isRunning()).toBe(false);
    });
  });
});
