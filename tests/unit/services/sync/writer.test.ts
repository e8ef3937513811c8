import { describe, it, expect } from "vitest";

import { WriteFailureError } from "../../../../src/errors.js";
import {
  SyncWriter,
  dedupePoints,
} from "../../../../src/services/sync/writer.js";
import { InMemorySeriesStore } from "../../../mocks/series-store.js";

import type { TimeSeriesPoint } from "../../../../src/types/index.js";

function point(
  series: string,
  timestamp: string,
  value: number | string
): TimeSeriesPoint {
  return {
    measurement: "activities",
    series,
    timestamp: new Date(timestamp),
    value,
    tags: { imported_from: "API" },
  };
}

function days(count: number): TimeSeriesPoint[] {
  return Array.from({ length: count }, (_, index) =>
    point("steps", `2020-01-0${String(index + 1)}T00:00:00.000Z`, index)
  );
}

describe("services/sync/writer", () => {
  describe("dedupePoints", () => {
    it("should keep the later of two points with the same identity", () => {
      const unique = dedupePoints(
        [
          point("steps", "2020-01-01T00:00:00.000Z", 1),
          point("steps", "2020-01-02T00:00:00.000Z", 5),
          point("steps", "2020-01-01T00:00:00.000Z", 2),
        ],
        "s"
      );

      expect(unique.map((p) => p.value)).toEqual([2, 5]);
    });

    it("should compare timestamps after truncation to the precision", () => {
      const unique = dedupePoints(
        [
          point("steps", "2020-01-01T10:15:00.000Z", 1),
          point("steps", "2020-01-01T10:45:00.000Z", 2),
        ],
        "h"
      );

      expect(unique).toHaveLength(1);
      expect(unique[0]?.value).toBe(2);
      expect(unique[0]?.timestamp.toISOString()).toBe("2020-01-01T10:00:00.000Z");
    });

    it("should keep points of different series apart", () => {
      expect(
        dedupePoints(
          [
            point("steps", "2020-01-01T00:00:00.000Z", 1),
            point("floors", "2020-01-01T00:00:00.000Z", 1),
          ],
          "h"
        )
      ).toHaveLength(2);
    });
  });

  describe("SyncWriter", () => {
    it("should write exactly one point for duplicated input", async () => {
      const store = new InMemorySeriesStore();
      const writer = new SyncWriter({ store });

      const result = await writer.write(
        [
          point("steps", "2020-01-01T00:00:00.000Z", 100),
          point("steps", "2020-01-01T00:00:00.000Z", 200),
        ],
        { precision: "h" }
      );

      expect(result).toEqual({
        received: 2,
        deduplicated: 1,
        written: 1,
        inserted: 1,
        updated: 0,
        batches: 1,
        skipped: false,
      });
      expect(store.seriesRows("activities", "steps").map((row) => row.value)).toEqual([
        200,
      ]);
    });

    it("should split the points into batches", async () => {
      const store = new InMemorySeriesStore();
      const writer = new SyncWriter({ store, batchSize: 2 });

      const result = await writer.write(days(5), { precision: "h" });

      expect(result.batches).toBe(3);
      expect(store.batches).toEqual([
        { size: 2, precision: "h" },
        { size: 2, precision: "h" },
        { size: 1, precision: "h" },
      ]);
    });

    it("should let the per-call batch size override the default", async () => {
      const store = new InMemorySeriesStore();
      const writer = new SyncWriter({ store, batchSize: 2 });

      await writer.write(days(5), { precision: "s", batchSize: 5 });

      expect(store.batches).toEqual([{ size: 5, precision: "s" }]);
    });

    it("should count rewritten points as updated", async () => {
      const store = new InMemorySeriesStore();
      const writer = new SyncWriter({ store });
      await writer.write(days(3), { precision: "h" });

      const result = await writer.write(days(4), { precision: "h" });

      expect(result.inserted).toBe(1);
      expect(result.updated).toBe(3);
    });

    it("should skip the write when the stored count matches", async () => {
      const store = new InMemorySeriesStore();
      const writer = new SyncWriter({ store });
      await writer.write(days(3), { precision: "h" });

      const result = await writer.write(days(3), {
        precision: "h",
        countCheck: { measurement: "activities", series: "steps" },
      });

      expect(result.skipped).toBe(true);
      expect(result.written).toBe(0);
      expect(store.batches).toHaveLength(1);
    });

    it("should write when the stored count differs", async () => {
      const store = new InMemorySeriesStore();
      const writer = new SyncWriter({ store });
      await writer.write(days(2), { precision: "h" });

      const result = await writer.write(days(3), {
        precision: "h",
        countCheck: { measurement: "activities", series: "steps" },
      });

      expect(result.skipped).toBe(false);
      expect(result.inserted).toBe(1);
    });

    it("should only count values inside the given range", async () => {
      const store = new InMemorySeriesStore();
      const writer = new SyncWriter({ store });
      await writer.write(days(3), { precision: "h" });

      const result = await writer.write(
        [point("steps", "2020-01-03T00:00:00.000Z", 2)],
        {
          precision: "h",
          countCheck: {
            measurement: "activities",
            series: "steps",
            range: {
              from: new Date("2020-01-03T00:00:00.000Z"),
              to: new Date("2020-01-04T00:00:00.000Z"),
            },
          },
        }
      );

      expect(result.skipped).toBe(true);
    });

    it("should raise a write failure with batch context when the store throws", async () => {
      const store = new InMemorySeriesStore();
      store.failOnBatch = 1;
      const writer = new SyncWriter({ store, batchSize: 2 });

      const error = await writer
        .write(days(5), { precision: "h" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WriteFailureError);
      if (error instanceof WriteFailureError) {
        expect(error.context).toEqual({
          measurement: "activities",
          series: "steps",
          batchIndex: 1,
          batchSize: 2,
          totalPoints: 5,
        });
        expect(error.exitCode).toBe(3);
      }
    });

    it("should report the fetched day range of a failed write", async () => {
      const store = new InMemorySeriesStore();
      store.failOnBatch = 0;
      const writer = new SyncWriter({ store });

      const error = await writer
        .write(days(3), {
          precision: "h",
          interval: { start: "2020-01-01", end: "2020-01-03" },
        })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WriteFailureError);
      if (error instanceof WriteFailureError) {
        expect(error.context).toEqual({
          measurement: "activities",
          series: "steps",
          interval: { start: "2020-01-01", end: "2020-01-03" },
          batchIndex: 0,
          batchSize: 3,
          totalPoints: 3,
        });
      }
    });

    it("should raise a write failure when the store rejects a batch", async () => {
      const store = new InMemorySeriesStore();
      store.rejectBatch = 0;
      const writer = new SyncWriter({ store });

      await expect(writer.write(days(1), { precision: "h" })).rejects.toBeInstanceOf(
        WriteFailureError
      );
    });

    it("should return an empty result for no points", async () => {
      const store = new InMemorySeriesStore();
      const writer = new SyncWriter({ store });

      const result = await writer.write([], { precision: "h" });

      expect(result.batches).toBe(0);
      expect(store.batches).toEqual([]);
    });
  });
});
