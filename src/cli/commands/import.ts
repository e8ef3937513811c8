import ora from "ora";

import { loadConfig } from "../../config.js";
import {
  EXPORT_BATCH_SIZE,
  ExportImporter,
} from "../../services/export/importer.js";
import { SyncWriter } from "../../services/sync/writer.js";
import { displayImportResults } from "../utils/display.js";
import {
  createStoreRuntime,
  failCommand,
  type StoreRuntime,
} from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Import Command
// ============================================================================

export function registerImportCommand(program: Command): void {
  program
    .command("import")
    .description("Load a Fitbit account data export")
    .argument("<dir>", "Export directory containing user-site-export/")
    .action(async (dir: string) => {
      const spinner = ora(`Importing ${dir}...`).start();
      let runtime: StoreRuntime | undefined;

      try {
        runtime = createStoreRuntime(loadConfig());
        const importer = new ExportImporter({
          store: runtime.store,
          writer: new SyncWriter({
            store: runtime.store,
            batchSize: EXPORT_BATCH_SIZE,
          }),
        });
        importer.setProgressCallback((progress) => {
          spinner.text = `Importing ${progress.measurement} (${String(progress.current)}/${String(progress.total)})`;
        });

        const results = await importer.importAll(dir);
        const written = results.reduce((sum, result) => sum + result.written, 0);
        spinner.succeed(`Imported ${String(written)} points`);
        displayImportResults(results);
      } catch (error) {
        failCommand(error, spinner);
      } finally {
        await runtime?.connection.close();
      }
    });
}
