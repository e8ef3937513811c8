import { input, password } from "@inquirer/prompts";
import chalk from "chalk";

import { loadConfig } from "../../config.js";
import { FileCredentialStore } from "../../source/credentials.js";
import { failCommand } from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Auth Commands
// ============================================================================

function required(value: string): true | string {
  return value.trim() !== "" || "Required";
}

export function registerAuthCommand(program: Command): void {
  const auth = program
    .command("auth")
    .description("Manage Fitbit OAuth credentials");

  // auth init
  auth
    .command("init")
    .description("Write client and token files to the credential directory")
    .action(async () => {
      try {
        const { credentialsPath } = loadConfig();
        console.log(
          chalk.bold(`Credentials will be written to ${credentialsPath}\n`)
        );

        const clientId = await input({
          message: "Client ID:",
          validate: required,
        });
        const clientSecret = await password({
          message: "Client secret:",
          mask: "*",
          validate: required,
        });
        const accessToken = await password({
          message: "Access token:",
          mask: "*",
          validate: required,
        });
        const refreshToken = await password({
          message: "Refresh token:",
          mask: "*",
          validate: required,
        });

        // Unknown expiry: the first request finds out and refreshes
        await new FileCredentialStore(credentialsPath).save({
          clientId: clientId.trim(),
          clientSecret: clientSecret.trim(),
          accessToken: accessToken.trim(),
          refreshToken: refreshToken.trim(),
          expiresAt: null,
        });

        console.log(chalk.green(`\nSaved credentials to ${credentialsPath}`));
      } catch (error) {
        failCommand(error);
      }
    });
}
