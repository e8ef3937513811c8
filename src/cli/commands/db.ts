import ora from "ora";

import { loadConfig } from "../../config.js";
import {
  checkConnection,
  getPoolStats,
  maskDatabaseUrl,
} from "../../db/connection.js";
import { getTableStats, hasSchema, runMigration } from "../../db/migrate.js";
import {
  createStoreRuntime,
  failCommand,
  type StoreRuntime,
} from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the schema and the series table")
    .option("--fresh", "Drop the schema first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();
      let runtime: StoreRuntime | undefined;

      try {
        runtime = createStoreRuntime(loadConfig());
        const { schema } = runtime.config.database;
        if (options.fresh === true) {
          spinner.text = `Dropping schema ${schema}...`;
        }

        await runMigration(runtime.connection.db, schema, {
          fresh: options.fresh,
        });
        spinner.succeed(`Migration of schema ${schema} completed successfully`);

        const stats = await getTableStats(runtime.connection.db, schema);
        if (stats.length > 0) {
          console.log("\nTables:");
          for (const row of stats) {
            console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
          }
        }
      } catch (error) {
        failCommand(error, spinner);
      } finally {
        await runtime?.connection.close();
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();
      let runtime: StoreRuntime | undefined;

      try {
        runtime = createStoreRuntime(loadConfig());
        const { connection, config } = runtime;
        const url = maskDatabaseUrl(config.database.url);
        const connected = await checkConnection(connection.pool);

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase URL: ${url}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase URL: ${url}`);

        const poolStats = getPoolStats(connection.pool);
        console.log("\nPool statistics:");
        console.log(`  Total connections: ${String(poolStats.totalCount)}`);
        console.log(`  Idle connections: ${String(poolStats.idleCount)}`);
        console.log(`  Waiting requests: ${String(poolStats.waitingCount)}`);

        const { schema } = config.database;
        if (!(await hasSchema(connection.db, schema))) {
          console.log(`\nSchema ${schema}: Not initialized (run 'db migrate')`);
        } else {
          const stats = await getTableStats(connection.db, schema);
          console.log(`\nTable statistics (${schema}):`);
          for (const row of stats) {
            console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
          }
        }
      } catch (error) {
        failCommand(error, spinner);
      } finally {
        await runtime?.connection.close();
      }
    });
}
