import chalk from "chalk";

import { logger } from "../../logger.js";
import { PassScheduler } from "../../services/sync/loop.js";
import {
  createSyncRuntime,
  failCommand,
  type SyncRuntime,
} from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Run Command
// ============================================================================

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Sync forever: one pass, then sleep SYNC_INTERVAL_SECONDS")
    .action(async () => {
      let runtime: SyncRuntime | undefined;

      try {
        runtime = await createSyncRuntime();
        const { config, loop } = runtime;
        await loop.initialize();

        const scheduler = new PassScheduler(
          loop,
          config.sync.intervalSeconds * 1000
        );

        // once: a second signal gets Node's default handling and exits
        const shutdown = (signal: NodeJS.Signals): void => {
          logger.info(
            { signal },
            "Stopping after the current series; signal again to force"
          );
          scheduler.stop();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);

        console.log(
          chalk.bold(
            `Syncing every ${String(config.sync.intervalSeconds)}s (Ctrl+C to stop)`
          )
        );
        await scheduler.start();
      } catch (error) {
        failCommand(error);
      } finally {
        await runtime?.connection.close();
      }
    });
}
