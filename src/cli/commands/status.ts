/**
 * status command - Show what the local mirror holds
 */

import chalk from "chalk";
import * as path from "node:path";
import { createLogger } from "../../utils/index.js";
import { openTracker, printHeader, warnIfNotInitialized } from "./shared.js";

const logger = createLogger("status");

export interface StatusOptions {
  verbose?: boolean;
}

/**
 * Show record counts, storage locations and the latest change
 */
export async function statusCommand(options: StatusOptions): Promise<void> {
  logger.info({ options }, "Checking status");

  await warnIfNotInitialized();
  const tracker = await openTracker();
  const { ledger, store, history, paths, config } = tracker;

  const active = ledger.entries();
  const removed = ledger.removedEntries();
  const stored = await store.list();

  let latest: { id: string; lastUpdated: string } | null = null;
  for (const [id, record] of active) {
    if (!latest || record.lastUpdated > latest.lastUpdated) {
      latest = { id, lastUpdated: record.lastUpdated };
    }
  }

  printHeader("Schema Ledger Status");

  console.log();
  console.log(chalk.white.bold("Storage"));
  console.log(`  Data dir:     ${chalk.dim(path.relative(process.cwd(), paths.dataDir) || ".")}`);
  console.log(`  History:      ${config.historyBackend}`);
  if (options.verbose) {
    console.log(`  Ledger:       ${chalk.dim(paths.versionFile)}`);
    console.log(`  Archive:      ${chalk.dim(paths.removedFile)}`);
    console.log(`  Schemas:      ${chalk.dim(paths.schemasDir)}`);
  }

  console.log();
  console.log(chalk.white.bold("Records"));
  if (active.length === 0 && removed.length === 0) {
    console.log(chalk.yellow("  No pass recorded yet"));
    console.log(chalk.dim("  Run"), chalk.white("cfn-schema-ledger sync"), chalk.dim("to take a snapshot"));
  } else {
    console.log(`  Active types:  ${active.length}`);
    console.log(`  Removed types: ${removed.length}`);
    console.log(`  Stored files:  ${stored.length}`);
    if (latest) {
      console.log(`  Last change:   ${latest.lastUpdated} ${chalk.dim(`(${latest.id})`)}`);
    }
  }

  if (history) {
    const head = await history.head();
    console.log();
    console.log(chalk.white.bold("History"));
    if (head) {
      console.log(`  Head:         ${chalk.dim(head.commitId.slice(0, 8))} ${head.timestamp}`);
      console.log(`  Files:        ${head.changes.length} changed in the last commit`);
      if (options.verbose) {
        console.log(`  Entries:      ${(await history.entries()).length}`);
      }
    } else {
      console.log(chalk.dim("  No history recorded yet"));
    }
  }

  console.log();
  console.log(chalk.dim("─".repeat(40)));

  logger.info("Status check complete");
}
