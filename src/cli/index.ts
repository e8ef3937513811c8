#!/usr/bin/env node

/**
 * fitsync CLI
 *
 * Keeps a Postgres time-series store in step with a Fitbit account.
 */

import { Command } from "commander";

import { registerAuthCommand } from "./commands/auth.js";
import { registerDbCommand } from "./commands/db.js";
import { registerImportCommand } from "./commands/import.js";
import { registerRunCommand } from "./commands/run.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("fitsync")
  .description("Incremental Fitbit to Postgres time-series sync")
  .version("0.1.0");

registerRunCommand(program);
registerSyncCommand(program);
registerStatusCommand(program);
registerDbCommand(program);
registerAuthCommand(program);
registerImportCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
