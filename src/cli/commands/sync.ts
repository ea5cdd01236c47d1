/**
 * sync command - Run one snapshot pass against the registry
 */

import chalk from "chalk";
import ora from "ora";
import { ConfigurationError, type PassSummary } from "../../core/index.js";
import { createLogger } from "../../utils/index.js";
import { HistoryBackendSchema, type TrackerConfigInput } from "../../utils/validation.js";
import { formatDuration, openTracker, printHeader, warnIfNotInitialized } from "./shared.js";

const logger = createLogger("sync");

export interface SyncOptions {
  concurrency?: number;
  timeout?: number;
  history?: string;
  json?: boolean;
}

const LISTED_IDS = 10;

function toOverrides(options: SyncOptions): TrackerConfigInput {
  const overrides: TrackerConfigInput = {
    concurrency: options.concurrency,
    fetchTimeoutMs: options.timeout,
  };
  if (options.history !== undefined) {
    const backend = HistoryBackendSchema.safeParse(options.history);
    if (!backend.success) {
      throw new ConfigurationError(
        `Unknown history backend "${options.history}" (expected ${HistoryBackendSchema.options.join(", ")})`
      );
    }
    overrides.historyBackend = backend.data;
  }
  return overrides;
}

function printIds(label: string, ids: string[], color: (text: string) => string): void {
  if (ids.length === 0) return;
  console.log();
  console.log(chalk.white.bold(`${label} (${ids.length})`));
  for (const id of ids.slice(0, LISTED_IDS)) {
    console.log(`  ${chalk.dim("•")} ${color(id)}`);
  }
  if (ids.length > LISTED_IDS) {
    console.log(chalk.dim(`  ... and ${ids.length - LISTED_IDS} more`));
  }
}

function printSummary(summary: PassSummary): void {
  printHeader("Sync Complete");
  console.log(`  Timestamp:   ${chalk.dim(summary.timestamp)}`);
  console.log(`  Enumerated:  ${summary.enumerated}`);
  if (summary.duplicates > 0) {
    console.log(`  Duplicates:  ${chalk.yellow(summary.duplicates)}`);
  }
  console.log(`  Processed:   ${summary.processed}`);
  console.log(`  Added:       ${chalk.green(summary.added)}`);
  console.log(`  Changed:     ${chalk.cyan(summary.changed)}`);
  console.log(`  Unchanged:   ${summary.unchanged}`);
  console.log(`  Removed:     ${chalk.magenta(summary.removed)}`);
  console.log(`  Errors:      ${summary.errored > 0 ? chalk.red(summary.errored) : 0}`);
  console.log(`  Duration:    ${formatDuration(summary.durationMs)}`);
  if (summary.historyCommitId) {
    console.log(`  Commit:      ${chalk.dim(summary.historyCommitId.slice(0, 8))}`);
  }

  printIds("Added", summary.addedIds, chalk.green);
  printIds("Changed", summary.changedIds, chalk.cyan);
  printIds("Removed", summary.removedIds, chalk.magenta);

  if (summary.errors.length > 0) {
    console.log();
    console.log(chalk.red.bold(`Skipped (${summary.errors.length})`));
    for (const error of summary.errors.slice(0, LISTED_IDS)) {
      console.log(`  ${chalk.dim(error.code)} ${error.id}: ${chalk.dim(error.message)}`);
    }
    if (summary.errors.length > LISTED_IDS) {
      console.log(chalk.dim(`  ... and ${summary.errors.length - LISTED_IDS} more`));
    }
  }
  console.log();
}

/**
 * Run one pass: fetch every schema, update the ledger, record history
 */
export async function syncCommand(options: SyncOptions): Promise<void> {
  logger.info({ options }, "Starting sync");

  if (!options.json) await warnIfNotInitialized();
  const tracker = await openTracker(toOverrides(options));

  const spinner = options.json ? null : ora("Listing registry types...").start();

  try {
    const summary = await tracker.sync(({ done, total }) => {
      if (spinner) spinner.text = `Fetching schemas ${done}/${total}...`;
    });

    if (!spinner) {
      console.log(JSON.stringify(summary, null, 2));
      return;
    }

    if (summary.errored > 0) {
      spinner.warn(chalk.yellow(`Pass finished with ${summary.errored} skipped type(s)`));
    } else {
      spinner.succeed(chalk.green("Pass finished"));
    }
    printSummary(summary);
  } catch (error) {
    spinner?.fail(chalk.red("Sync failed"));
    logger.error({ err: error }, "Sync failed");
    throw error;
  }
}
