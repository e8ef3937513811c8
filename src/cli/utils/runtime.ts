/**
 * Wiring shared by the CLI commands
 */

import chalk from "chalk";

import { loadConfig, type AppConfig } from "../../config.js";
import {
  createConnection,
  type DatabaseConnection,
} from "../../db/connection.js";
import {
  ConfigurationError,
  errorMessage,
  toExitCode,
} from "../../errors.js";
import { FitbitSourceClient } from "../../source/client.js";
import { FileCredentialStore } from "../../source/credentials.js";
import { RateLimitedFetcher } from "../../services/sync/fetcher.js";
import { SyncLoop } from "../../services/sync/loop.js";
import { PostgresSeriesStore } from "../../services/sync/store.js";
import { SyncWriter } from "../../services/sync/writer.js";

import type { Ora } from "ora";

export interface StoreRuntime {
  config: AppConfig;
  connection: DatabaseConnection;
  store: PostgresSeriesStore;
  writer: SyncWriter;
}

export interface SyncRuntime extends StoreRuntime {
  credentials: FileCredentialStore;
  loop: SyncLoop;
}

export function createStoreRuntime(
  config: AppConfig = loadConfig()
): StoreRuntime {
  const connection = createConnection(config.database.url);
  const store = new PostgresSeriesStore(connection.db, config.database.schema);
  const writer = new SyncWriter({ store, batchSize: config.sync.batchSize });
  return { config, connection, store, writer };
}

/**
 * Everything a sync pass needs. Credentials are read here, so a missing
 * credential fails before any connection is opened.
 */
export async function createSyncRuntime(
  config: AppConfig = loadConfig()
): Promise<SyncRuntime> {
  const credentials = new FileCredentialStore(config.credentialsPath);
  const client = new FitbitSourceClient({
    credentials: await credentials.load(),
    apiUrl: config.source.apiUrl,
    units: config.source.units,
    requestTimeoutMs: config.source.requestTimeoutMs,
  });
  const fetcher = new RateLimitedFetcher(client, credentials, {
    policy: {
      transientDelayMs: config.sync.transientRetryMs,
      rateLimitDelayMs: config.sync.rateLimitWaitMs,
    },
  });

  const runtime = createStoreRuntime(config);
  const loop = new SyncLoop({
    fetcher,
    writer: runtime.writer,
    store: runtime.store,
    maxSpanDays: config.sync.maxRequestSpanDays,
    skipUnchangedCounts: config.sync.skipUnchangedCounts,
  });

  return { ...runtime, credentials, loop };
}

/**
 * Report a fatal error and set the exit status for its kind
 */
export function failCommand(error: unknown, spinner?: Ora): void {
  const message = errorMessage(error);
  if (spinner) {
    spinner.fail(`Failed: ${message}`);
  } else {
    console.error(chalk.red(`Error: ${message}`));
  }
  if (error instanceof ConfigurationError) {
    for (const problem of error.problems) {
      console.error(chalk.gray(`  - ${problem}`));
    }
  }
  process.exitCode = toExitCode(error);
}
