import { describe, it, expect, vi } from "vitest";

import {
  FetchAbortedError,
  RateLimitExceededError,
  RequestTimeoutError,
  ServerError,
  SourceRequestError,
} from "../../../../src/errors.js";
import { findFamily } from "../../../../src/services/sync/families.js";
import {
  RateLimitedFetcher,
  decideRetry,
} from "../../../../src/services/sync/fetcher.js";
import { InMemoryCredentialStore } from "../../../mocks/credential-store.js";
import { ScriptedSourceClient } from "../../../mocks/source-client.js";

import type {
  MeasurementFamily,
  SeriesSpec,
} from "../../../../src/services/sync/families.js";
import type { SyncInterval } from "../../../../src/types/index.js";

const policy = { transientDelayMs: 15_000, rateLimitDelayMs: 3_610_000 };

const interval: SyncInterval = {
  start: new Date("2020-01-01T00:00:00.000Z"),
  end: new Date("2020-01-05T00:00:00.000Z"),
};

function lookup(familyName: string, seriesName: string): [MeasurementFamily, SeriesSpec] {
  const family = findFamily(familyName);
  const series = family?.series.find((spec) => spec.name === seriesName);
  if (!family || !series) {
    throw new Error(`Unknown series ${familyName}/${seriesName}`);
  }
  return [family, series];
}

function createFetcher() {
  const client = new ScriptedSourceClient(new Date("2020-01-01T00:00:00.000Z"));
  const credentials = new InMemoryCredentialStore();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const fetcher = new RateLimitedFetcher(client, credentials, { policy, sleep });
  return { client, credentials, sleep, fetcher };
}

describe("services/sync/fetcher", () => {
  // ============================================================================
  // decideRetry
  // ============================================================================

  describe("decideRetry", () => {
    it("should succeed with the value", () => {
      expect(decideRetry({ ok: true, value: 42 }, policy)).toEqual({
        action: "succeed",
        value: 42,
      });
    });

    it("should wait the transient delay after a timeout", () => {
      expect(
        decideRetry({ ok: false, error: new RequestTimeoutError("timed out") }, policy)
      ).toEqual({ action: "wait", delayMs: 15_000, reason: "timeout" });
    });

    it("should wait the transient delay after a server error", () => {
      expect(
        decideRetry({ ok: false, error: new ServerError("bad gateway", 502) }, policy)
      ).toEqual({ action: "wait", delayMs: 15_000, reason: "server-error-502" });
    });

    it("should wait out the quota window after rate limiting", () => {
      expect(
        decideRetry(
          { ok: false, error: new RateLimitExceededError("slow down", 1200) },
          policy
        )
      ).toEqual({ action: "wait", delayMs: 3_610_000, reason: "rate-limit" });
    });

    it("should wait longer when the source reports a later reset", () => {
      expect(
        decideRetry(
          { ok: false, error: new RateLimitExceededError("slow down", 7200) },
          policy
        )
      ).toEqual({ action: "wait", delayMs: 7_200_000, reason: "rate-limit" });
    });

    it("should give up on anything else", () => {
      const error = new SourceRequestError("forbidden", 403);

      expect(decideRetry({ ok: false, error }, policy)).toEqual({
        action: "give-up",
        error,
      });
    });
  });

  // ============================================================================
  // RateLimitedFetcher
  // ============================================================================

  describe("RateLimitedFetcher", () => {
    it("should request the series resource over the interval", async () => {
      const { client, fetcher } = createFetcher();
      client.respond("activities/steps", () => ({
        "activities-steps": [{ dateTime: "2020-01-01", value: "10" }],
      }));
      const [family, series] = lookup("activities", "steps");

      const items = await fetcher.fetch(family, series, interval);

      expect(items).toEqual([{ dateTime: "2020-01-01", value: "10" }]);
      expect(client.requests).toEqual([
        {
          resource: "activities/steps",
          start: "2020-01-01",
          end: "2020-01-05",
          apiVersion: "1",
        },
      ]);
    });

    it("should request sleep as its own resource on API 1.2", async () => {
      const { client, fetcher } = createFetcher();
      const [family, series] = lookup("sleep", "sleep");

      await fetcher.fetch(family, series, interval);

      expect(client.requests[0]).toMatchObject({
        resource: "sleep",
        apiVersion: "1.2",
      });
    });

    it("should sleep before each retry and not after the success", async () => {
      const { client, fetcher, sleep } = createFetcher();
      client
        .failNext(
          new RequestTimeoutError("timed out"),
          new ServerError("unavailable", 503),
          new RateLimitExceededError("too many requests", null)
        )
        .respond("activities/steps", () => ({
          "activities-steps": [{ dateTime: "2020-01-03", value: "5" }],
        }));
      const [family, series] = lookup("activities", "steps");

      const items = await fetcher.fetch(family, series, interval);

      expect(items).toEqual([{ dateTime: "2020-01-03", value: "5" }]);
      expect(client.requests).toHaveLength(4);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([
        15_000, 15_000, 3_610_000,
      ]);
    });

    it("should abort with context on a non-transient error", async () => {
      const { client, fetcher, sleep } = createFetcher();
      const cause = new SourceRequestError("invalid_grant", 400);
      client.failNext(cause);
      const [family, series] = lookup("body", "weight");

      const error = await fetcher.fetch(family, series, interval).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(FetchAbortedError);
      if (error instanceof FetchAbortedError) {
        expect(error.context).toEqual({
          resource: "body/weight",
          interval: { start: "2020-01-01", end: "2020-01-05" },
          attempts: 1,
        });
        expect(error.cause).toBe(cause);
        expect(error.exitCode).toBe(4);
      }
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should stop waiting when the signal aborts, without wrapping the abort", async () => {
      const client = new ScriptedSourceClient(new Date("2020-01-01T00:00:00.000Z"));
      const sleep = vi.fn(
        (_ms: number, signal?: AbortSignal) =>
          new Promise<void>((_resolve, reject) => {
            if (!signal) {
              return;
            }
            const aborting = signal;
            aborting.addEventListener("abort", () => reject(aborting.reason), {
              once: true,
            });
          })
      );
      const fetcher = new RateLimitedFetcher(client, new InMemoryCredentialStore(), {
        policy,
        sleep,
      });
      client.failNext(new RateLimitExceededError("too many requests"));
      const controller = new AbortController();
      const stopped = new Error("stopped");
      const [family, series] = lookup("activities", "steps");

      const pending = fetcher
        .fetch(family, series, interval, controller.signal)
        .catch((e: unknown) => e);
      await vi.waitFor(() => {
        expect(sleep).toHaveBeenCalledTimes(1);
      });
      controller.abort(stopped);

      await expect(pending).resolves.toBe(stopped);
      expect(client.requests).toHaveLength(1);
    });

    it("should not start a request once the signal has aborted", async () => {
      const { client, fetcher } = createFetcher();
      const controller = new AbortController();
      controller.abort(new Error("stopped"));
      const [family, series] = lookup("activities", "steps");

      await expect(
        fetcher.fetch(family, series, interval, controller.signal)
      ).rejects.toThrow("stopped");
      expect(client.requests).toEqual([]);
    });

    it("should abort when the response carries no item list", async () => {
      const { client, fetcher } = createFetcher();
      client.respond("foods/log/water", () => ({ summary: { water: 0 } }));
      const [family, series] = lookup("foods_log", "water");

      await expect(fetcher.fetch(family, series, interval)).rejects.toBeInstanceOf(
        FetchAbortedError
      );
    });

    it("should read the profile through the same retry loop", async () => {
      const { client, fetcher, sleep } = createFetcher();
      client.failNext(new ServerError("unavailable", 500));

      const profile = await fetcher.getProfile();

      expect(profile.memberSince).toEqual(new Date("2020-01-01T00:00:00.000Z"));
      expect(client.profileCalls).toBe(2);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([15_000]);
    });

    it("should persist rotated tokens through the credential store", async () => {
      const { client, credentials } = createFetcher();

      await client.rotateTokens({
        accessToken: "new-access",
        refreshToken: "new-refresh",
        expiresIn: 28_800,
      });

      expect(credentials.rotations).toEqual([
        { accessToken: "new-access", refreshToken: "new-refresh", expiresIn: 28_800 },
      ]);
      expect(credentials.credentials.refreshToken).toBe("new-refresh");
    });
  });
});
