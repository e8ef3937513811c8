/**
 * Rate Limited Fetcher - One interval of one series, retried until it lands
 *
 * Every request outcome is classified by `decideRetry` into succeed, wait
 * or give up. Waiting is done through the injected `sleep`, so the same
 * loop runs against the real clock and in tests.
 */

import { setTimeout as delay } from "node:timers/promises";

import {
  FetchAbortedError,
  RateLimitExceededError,
  ServerError,
  errorMessage,
  isTransientError,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { formatDay } from "../../utils/dates.js";
import { resourcePath } from "./families.js";
import { extractItems } from "./transform.js";

import type { CredentialStore } from "../../source/credentials.js";
import type { SourceClient } from "../../source/client.js";
import type {
  RawItem,
  RawPayload,
  SyncInterval,
  UserProfile,
} from "../../types/index.js";
import type { MeasurementFamily, SeriesSpec } from "./families.js";

// ============================================================================
// Retry policy
// ============================================================================

export type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

export type RetryDecision<T> =
  | { action: "succeed"; value: T }
  | { action: "wait"; delayMs: number; reason: string }
  | { action: "give-up"; error: unknown };

export interface RetryPolicy {
  /** Wait after a timeout or server error */
  transientDelayMs: number;
  /** Wait after the source reports its hourly quota is used up */
  rateLimitDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  transientDelayMs: 15_000,
  rateLimitDelayMs: 3_610_000,
};

/**
 * Classify one attempt. Timeouts and server errors wait briefly, rate
 * limiting waits out the quota window (longer when the source reports a
 * later reset), anything else is fatal.
 */
export function decideRetry<T>(
  outcome: AttemptOutcome<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): RetryDecision<T> {
  if (outcome.ok) {
    return { action: "succeed", value: outcome.value };
  }

  const { error } = outcome;
  if (!isTransientError(error)) {
    return { action: "give-up", error };
  }
  if (error instanceof RateLimitExceededError) {
    return {
      action: "wait",
      delayMs: Math.max(
        policy.rateLimitDelayMs,
        (error.resetSeconds ?? 0) * 1000
      ),
      reason: "rate-limit",
    };
  }
  if (error instanceof ServerError) {
    return {
      action: "wait",
      delayMs: policy.transientDelayMs,
      reason: `server-error-${String(error.status)}`,
    };
  }
  return {
    action: "wait",
    delayMs: policy.transientDelayMs,
    reason: "timeout",
  };
}

// ============================================================================
// Fetcher
// ============================================================================

/** Rejects when `signal` aborts before `ms` have passed */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface FetcherOptions {
  policy?: RetryPolicy;
  sleep?: Sleep;
}

export class RateLimitedFetcher {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(
    private readonly client: SourceClient,
    credentialStore: CredentialStore,
    options: FetcherOptions = {}
  ) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.sleep =
      options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));

    client.setTokenRefreshCallback(async (rotation) => {
      await credentialStore.saveRotation(rotation);
    });
  }

  /**
   * Fetch the raw items of `series` over `interval`, waiting through
   * transient failures for as long as they last or until `signal` aborts.
   */
  async fetch(
    family: MeasurementFamily,
    series: SeriesSpec,
    interval: SyncInterval,
    signal?: AbortSignal
  ): Promise<RawItem[]> {
    const resource = resourcePath(family, series);
    const range = {
      start: formatDay(interval.start),
      end: formatDay(interval.end),
    };

    const payload = await this.withRetry<RawPayload>(
      () =>
        this.client.fetchTimeSeries(
          resource,
          interval.start,
          interval.end,
          family.apiVersion
        ),
      { resource, interval: range },
      signal
    );

    const items = extractItems(payload);
    if (items === null) {
      throw new FetchAbortedError(
        `Response for ${resource} ${range.start}..${range.end} contains no item list`,
        { resource, interval: range, attempts: 1 }
      );
    }

    syncLogger.debug(
      { resource, ...range, items: items.length },
      "Fetched interval"
    );
    return items;
  }

  async getProfile(signal?: AbortSignal): Promise<UserProfile> {
    return this.withRetry(
      () => this.client.getProfile(),
      { resource: "profile" },
      signal
    );
  }

  /**
   * An abort is rethrown as is, not as FetchAbortedError, so callers can
   * tell a stop from a failed fetch.
   */
  private async withRetry<T>(
    attempt: () => Promise<T>,
    context: { resource: string; interval?: { start: string; end: string } },
    signal?: AbortSignal
  ): Promise<T> {
    for (let attempts = 1; ; attempts++) {
      signal?.throwIfAborted();

      let outcome: AttemptOutcome<T>;
      try {
        outcome = { ok: true, value: await attempt() };
      } catch (error) {
        outcome = { ok: false, error };
      }

      const decision = decideRetry(outcome, this.policy);
      switch (decision.action) {
        case "succeed":
          return decision.value;
        case "wait":
          syncLogger.warn(
            {
              ...context,
              attempts,
              reason: decision.reason,
              delayMs: decision.delayMs,
              error: outcome.ok ? undefined : errorMessage(outcome.error),
            },
            "Request failed, waiting before retry"
          );
          await this.sleep(decision.delayMs, signal);
          break;
        case "give-up":
          syncLogger.error(
            { ...context, attempts, error: errorMessage(decision.error) },
            "Request failed permanently"
          );
          throw new FetchAbortedError(
            `Fetching ${context.resource} failed: ${errorMessage(decision.error)}`,
            { ...context, attempts },
            { cause: decision.error }
          );
      }
    }
  }
}
