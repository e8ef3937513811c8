import ora from "ora";

import { loadConfig } from "../../config.js";
import {
  MEASUREMENT_FAMILIES,
  keySeriesOf,
} from "../../services/sync/families.js";
import { displayStatus, type SeriesStatusRow } from "../utils/display.js";
import {
  createStoreRuntime,
  failCommand,
  type StoreRuntime,
} from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Status Command
// ============================================================================

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show the stored range and value count of every key series")
    .action(async () => {
      const spinner = ora("Reading stored series...").start();
      let runtime: StoreRuntime | undefined;

      try {
        runtime = createStoreRuntime(loadConfig());
        const { store } = runtime;
        const rows: SeriesStatusRow[] = [];

        for (const family of MEASUREMENT_FAMILIES) {
          for (const series of family.series) {
            const key = keySeriesOf(series);
            rows.push({
              measurement: family.name,
              series: key,
              first: await store.selectBoundary(
                family.name,
                key,
                "first",
                family.precision
              ),
              last: await store.selectBoundary(
                family.name,
                key,
                "last",
                family.precision
              ),
              count: await store.countValues(family.name, key),
            });
          }
        }

        const measurements = await store.listMeasurements();
        spinner.succeed(
          `${String(measurements.length)} measurements stored in ${runtime.config.database.schema}`
        );
        displayStatus(rows);
      } catch (error) {
        failCommand(error, spinner);
      } finally {
        await runtime?.connection.close();
      }
    });
}
