import chalk from "chalk";
import ora from "ora";

import { displayPassSummary, displayPlan } from "../utils/display.js";
import {
  createSyncRuntime,
  failCommand,
  type SyncRuntime,
} from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Run or preview a single sync pass");

  // sync once
  sync
    .command("once")
    .description("Run one pass over every measurement family, then exit")
    .action(async () => {
      const spinner = ora("Preparing sync...").start();
      let runtime: SyncRuntime | undefined;

      try {
        runtime = await createSyncRuntime();
        const { loop } = runtime;

        spinner.text = "Initializing store and profile...";
        await loop.initialize();

        loop.setProgressCallback((progress) => {
          spinner.text = `${progress.phase} ${String(progress.current)}/${String(progress.total)} (${progress.currentItem ?? ""})`;
        });

        const summary = await loop.runPass();
        spinner.succeed(
          `Synced ${String(summary.series.length)} series, ${String(summary.totals.inserted)} new points`
        );
        displayPassSummary(summary);
      } catch (error) {
        failCommand(error, spinner);
      } finally {
        await runtime?.connection.close();
      }
    });

  // sync plan
  sync
    .command("plan")
    .description("Show the intervals each series would fetch, without fetching")
    .action(async () => {
      const spinner = ora("Reading stored ranges...").start();
      let runtime: SyncRuntime | undefined;

      try {
        runtime = await createSyncRuntime();
        const plans = await runtime.loop.plan();
        spinner.stop();

        const pending = plans.filter(({ plan }) => plan.gapDetected);
        console.log(
          chalk.bold(
            `\n${String(pending.length)} of ${String(plans.length)} series have gaps\n`
          )
        );
        displayPlan(plans);
      } catch (error) {
        failCommand(error, spinner);
      } finally {
        await runtime?.connection.close();
      }
    });
}
