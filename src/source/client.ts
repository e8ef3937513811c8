import { sourceLogger } from "../logger.js";
import {
  RateLimitExceededError,
  RequestTimeoutError,
  ServerError,
  SourceRequestError,
} from "../errors.js";
import { formatDay, parseDay } from "../utils/dates.js";

import type {
  Credentials,
  RawPayload,
  TokenRotation,
  UserProfile,
} from "../types/index.js";

export type ApiVersion = "1" | "1.2";

export type TokenRefreshCallback = (rotation: TokenRotation) => Promise<void>;

/**
 * Capability consumed by the sync engine. Implementations signal transient
 * trouble with RequestTimeoutError, ServerError or RateLimitExceededError;
 * anything else they throw is fatal.
 */
export interface SourceClient {
  fetchTimeSeries(
    resource: string,
    start: Date,
    end: Date,
    apiVersion: ApiVersion
  ): Promise<RawPayload>;
  getProfile(): Promise<UserProfile>;
  /** Called, and awaited, every time the client rotates its tokens */
  setTokenRefreshCallback(callback: TokenRefreshCallback): void;
}

export interface FitbitClientOptions {
  credentials: Credentials;
  apiUrl?: string;
  /** Sent as Accept-Language; selects the unit system of returned values */
  units?: string;
  requestTimeoutMs?: number;
  /** Epoch milliseconds, for token expiry checks */
  now?: () => number;
}

const DEFAULT_API_URL = "https://api.fitbit.com";
const DEFAULT_MEMBER_SINCE = "1970-01-01";
/** Refresh this long before the recorded expiry */
const EXPIRY_MARGIN_SECONDS = 60;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const TIMEOUT_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "ETIMEDOUT",
]);

/**
 * The request signal also covers reading the body, so this is checked for
 * errors from `fetch()` and from `response.json()` / `response.text()`.
 */
function isTimeout(error: unknown): boolean {
  if (!isRecord(error)) {
    return false;
  }
  if (error.name === "TimeoutError" || error.name === "AbortError") {
    return true;
  }
  // undici reports its own timeouts as "fetch failed" with a coded cause
  const cause = error.cause;
  return (
    TIMEOUT_CODES.has(String(error.code)) ||
    (isRecord(cause) && TIMEOUT_CODES.has(String(cause.code)))
  );
}

function parseTokenResponse(body: unknown): TokenRotation {
  if (
    !isRecord(body) ||
    typeof body.access_token !== "string" ||
    typeof body.refresh_token !== "string"
  ) {
    throw new SourceRequestError("Token refresh returned no usable tokens");
  }
  const expiresIn = Number(body.expires_in);
  return {
    accessToken: body.access_token,
    refreshToken: body.refresh_token,
    expiresIn: Number.isFinite(expiresIn) ? expiresIn : 28_800,
  };
}

/**
 * Fitbit Web API client.
 *
 * Holds its own copy of the credentials; when the access token expires it
 * refreshes it, hands the new tokens to the refresh callback, and only then
 * issues the next request.
 */
export class FitbitSourceClient implements SourceClient {
  private credentials: Credentials;
  private onTokenRefresh?: TokenRefreshCallback;
  private readonly apiUrl: string;
  private readonly units: string;
  private readonly requestTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: FitbitClientOptions) {
    this.credentials = { ...options.credentials };
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.units = options.units ?? "en_GB";
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  setTokenRefreshCallback(callback: TokenRefreshCallback): void {
    this.onTokenRefresh = callback;
  }

  /**
   * Fetch a resource time series over an inclusive day range
   * @param resource - e.g. "activities/steps", "body/log/weight", "sleep"
   */
  async fetchTimeSeries(
    resource: string,
    start: Date,
    end: Date,
    apiVersion: ApiVersion = "1"
  ): Promise<RawPayload> {
    const path = `/${apiVersion}/user/-/${resource}/date/${formatDay(start)}/${formatDay(end)}.json`;
    sourceLogger.info(
      { resource, start: formatDay(start), end: formatDay(end) },
      "Fetching time series"
    );
    return this.getJson(path);
  }

  async getProfile(): Promise<UserProfile> {
    const body = await this.getJson("/1/user/-/profile.json");
    const user: Record<string, unknown> = isRecord(body.user) ? body.user : {};
    const raw =
      typeof user.memberSince === "string"
        ? user.memberSince
        : DEFAULT_MEMBER_SINCE;
    // Accounts without a usable date are synced from the epoch
    const memberSince = parseDay(raw) ?? new Date(0);

    sourceLogger.info({ memberSince: formatDay(memberSince) }, "Loaded profile");
    return { memberSince };
  }

  getCredentials(): Credentials {
    return { ...this.credentials };
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async getJson(path: string): Promise<RawPayload> {
    if (this.isAccessTokenExpired()) {
      sourceLogger.info("Access token expired, refreshing before request");
      await this.refreshAccessToken();
    }

    let response = await this.send(path, { headers: this.authHeaders() });

    if (response.status === 401) {
      const text = await this.readBody(path, () => response.text());
      if (!text.includes("expired_token")) {
        throw new SourceRequestError(
          `Unauthorized request to ${path}: ${text.slice(0, 200)}`,
          401
        );
      }
      sourceLogger.warn({ path }, "Access token rejected as expired, refreshing");
      await this.refreshAccessToken();
      response = await this.send(path, { headers: this.authHeaders() });
    }

    if (!response.ok) {
      throw await this.toError(response, path);
    }

    const body = await this.readBody(path, (): Promise<unknown> =>
      response.json()
    );
    if (!isRecord(body)) {
      throw new SourceRequestError(`Unexpected response body from ${path}`);
    }
    return body;
  }

  private async send(path: string, init: RequestInit): Promise<Response> {
    const url = `${this.apiUrl}${path}`;
    const method = init.method ?? "GET";
    sourceLogger.debug({ method, url }, "Sending request to Fitbit API");

    const startTime = performance.now();
    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new RequestTimeoutError(
          `Request to ${path} timed out after ${String(this.requestTimeoutMs)}ms`,
          { cause: error }
        );
      }
      throw error;
    }
    const duration = Math.round(performance.now() - startTime);

    sourceLogger.debug(
      {
        method,
        url,
        status: response.status,
        duration: `${String(duration)}ms`,
        rateLimitRemaining: response.headers.get("Fitbit-Rate-Limit-Remaining"),
      },
      "Received response from Fitbit API"
    );

    return response;
  }

  private async readBody<T>(path: string, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      if (isTimeout(error)) {
        throw new RequestTimeoutError(
          `Reading the response of ${path} timed out after ${String(this.requestTimeoutMs)}ms`,
          { cause: error }
        );
      }
      throw error;
    }
  }

  private async toError(response: Response, path: string): Promise<Error> {
    const text = await this.readBody(path, () => response.text());
    const detail = `${String(response.status)} ${response.statusText} from ${path}`;

    if (response.status === 429) {
      const reset = Number(response.headers.get("Fitbit-Rate-Limit-Reset"));
      return new RateLimitExceededError(
        `Rate limit exceeded: ${detail}`,
        Number.isFinite(reset) && reset > 0 ? reset : null
      );
    }
    if (response.status >= 500) {
      return new ServerError(`Server error: ${detail}`, response.status);
    }
    return new SourceRequestError(
      `Request failed: ${detail}: ${text.slice(0, 200)}`,
      response.status
    );
  }

  private authHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.credentials.accessToken}`,
      "Accept-Language": this.units,
    };
  }

  private isAccessTokenExpired(): boolean {
    const { expiresAt } = this.credentials;
    if (expiresAt === null) {
      return false;
    }
    return this.now() / 1000 >= expiresAt - EXPIRY_MARGIN_SECONDS;
  }

  // ==========================================================================
  // OAuth
  // ==========================================================================

  private async refreshAccessToken(): Promise<void> {
    const { clientId, clientSecret, refreshToken } = this.credentials;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");

    const response = await this.send("/oauth2/token", {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Basic ${basic}`,
      },
      body: new URLSearchParams({
        grant_type: "refresh_token",
        refresh_token: refreshToken,
      }).toString(),
    });

    if (!response.ok) {
      throw await this.toError(response, "/oauth2/token");
    }

    const rotation = parseTokenResponse(
      await this.readBody("/oauth2/token", (): Promise<unknown> =>
        response.json()
      )
    );
    const expiresAt = Math.floor(this.now() / 1000) + rotation.expiresIn;
    this.credentials = {
      ...this.credentials,
      accessToken: rotation.accessToken,
      refreshToken: rotation.refreshToken,
      expiresAt,
    };

    // Persist before anything else uses the new refresh token: the old one
    // is already revoked by the source
    await this.onTokenRefresh?.(rotation);

    sourceLogger.info(
      { expiresAt: new Date(expiresAt * 1000).toISOString() },
      "Access token refreshed"
    );
  }
}
