/**
 * Runtime configuration
 *
 * Read from the environment (and .env through dotenv), validated and
 * converted with a TypeBox schema. Credentials are not part of it: they live
 * in the credential directory, see source/credentials.ts.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

export const EnvSchema = Type.Object({
  DATABASE_URL: Type.String({
    default: "postgresql://localhost:5432/fitsync",
    minLength: 1,
  }),
  DB_SCHEMA: Type.String({
    default: "fitbit",
    pattern: "^[a-z_][a-z0-9_]*$",
  }),
  CONFIG_PATH: Type.String({ default: "./config", minLength: 1 }),
  FITBIT_API_URL: Type.String({
    default: "https://api.fitbit.com",
    minLength: 1,
  }),
  UNITS: Type.String({ default: "en_GB", minLength: 1 }),
  REQUEST_TIMEOUT_MS: Type.Integer({ default: 60_000, minimum: 1000 }),
  SYNC_INTERVAL_SECONDS: Type.Integer({ default: 3610 * 4, minimum: 60 }),
  MAX_REQUEST_SPAN_DAYS: Type.Integer({ default: 28, minimum: 1, maximum: 31 }),
  WRITE_BATCH_SIZE: Type.Integer({ default: 2500, minimum: 1, maximum: 10_000 }),
  SKIP_UNCHANGED_COUNTS: Type.Boolean({ default: false }),
  TRANSIENT_RETRY_SECONDS: Type.Integer({ default: 15, minimum: 0 }),
  RATE_LIMIT_WAIT_SECONDS: Type.Integer({ default: 3610, minimum: 0 }),
});

export type Env = Static<typeof EnvSchema>;

export interface AppConfig {
  database: {
    url: string;
    schema: string;
  };
  credentialsPath: string;
  source: {
    apiUrl: string;
    units: string;
    requestTimeoutMs: number;
  };
  sync: {
    intervalSeconds: number;
    maxRequestSpanDays: number;
    batchSize: number;
    skipUnchangedCounts: boolean;
    transientRetryMs: number;
    rateLimitWaitMs: number;
  };
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Keep only the keys the schema knows, dropping empty strings so that
 * defaults apply to `FOO=` lines in .env files.
 */
function pickKnownKeys(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      picked[key] = value.trim();
    }
  }
  return picked;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const converted = Value.Convert(
    EnvSchema,
    Value.Default(EnvSchema, pickKnownKeys(env))
  );

  if (!Value.Check(EnvSchema, converted)) {
    const problems = [...Value.Errors(EnvSchema, converted)].map(
      (error) => `${error.path.replace(/^\//, "")}: ${error.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration: ${problems.join("; ")}`,
      problems
    );
  }

  return {
    database: {
      url: converted.DATABASE_URL,
      schema: converted.DB_SCHEMA,
    },
    credentialsPath: converted.CONFIG_PATH,
    source: {
      apiUrl: converted.FITBIT_API_URL.replace(/\/+$/, ""),
      units: converted.UNITS,
      requestTimeoutMs: converted.REQUEST_TIMEOUT_MS,
    },
    sync: {
      intervalSeconds: converted.SYNC_INTERVAL_SECONDS,
      maxRequestSpanDays: converted.MAX_REQUEST_SPAN_DAYS,
      batchSize: converted.WRITE_BATCH_SIZE,
      skipUnchangedCounts: converted.SKIP_UNCHANGED_COUNTS,
      transientRetryMs: converted.TRANSIENT_RETRY_SECONDS * 1000,
      rateLimitWaitMs: converted.RATE_LIMIT_WAIT_SECONDS * 1000,
    },
  };
}
