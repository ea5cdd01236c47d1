#!/usr/bin/env node

/**
 * cfn-schema-ledger CLI
 * Versioned local mirror of the CloudFormation resource schema registry
 */

import { Command, Option } from "commander";
import chalk from "chalk";
import { initCommand } from "./commands/init.js";
import { syncCommand } from "./commands/sync.js";
import { statusCommand } from "./commands/status.js";
import { versionsCommand } from "./commands/versions.js";
import { historyCommand } from "./commands/history.js";
import { removedCommand } from "./commands/removed.js";
import { parsePositiveInt } from "./commands/shared.js";
import { isSchemaLedgerError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("cfn-schema-ledger")
  .description("Track when CloudFormation resource type schemas appear, change and disappear")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("init")
  .description("Write a configuration file for the current project")
  .option("-f, --force", "Overwrite an existing configuration")
  .action(initCommand);

program
  .command("sync")
  .description("Fetch every public resource schema and update the ledger")
  .option("-c, --concurrency <n>", "Parallel schema fetches", parsePositiveInt)
  .option("-t, --timeout <ms>", "Timeout for a single schema fetch", parsePositiveInt)
  .addOption(new Option("--history <backend>", "History backend").choices(["none", "file", "git"]))
  .option("--json", "Print the pass summary as JSON")
  .action(syncCommand);

program
  .command("status")
  .description("Show what the local mirror holds")
  .option("-v, --verbose", "Show file locations and history size")
  .action(statusCommand);

program
  .command("versions")
  .description("List types by their latest schema change")
  .option("-l, --limit <n>", "Number of types to show", parsePositiveInt)
  .option("-p, --prefix <prefix>", "Only types starting with this prefix")
  .action(versionsCommand);

program
  .command("history")
  .description("Show the change timeline of one resource type")
  .argument("<typeName>", "Resource type, e.g. AWS::S3::Bucket")
  .option("-l, --limit <n>", "Number of history entries to show", parsePositiveInt)
  .action(historyCommand);

program
  .command("removed")
  .description("List resource types that disappeared from the registry")
  .action(removedCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Report a fatal error and exit with status 1
 */
function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    const message = isSchemaLedgerError(error) ? error.toString() : error.message;
    console.error(chalk.red(`\nError: ${message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

/**
 * Exit on signal. State files are only replaced by rename, and a lock left
 * by this process is taken over as stale on the next run.
 */
function shutdown(signal: string): void {
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, exiting...`));
  process.exit(130);
}

// Handle SIGINT (Ctrl+C)
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle SIGTERM (kill command)
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

// Parse command line arguments
program.parseAsync(process.argv).catch(handleError);
