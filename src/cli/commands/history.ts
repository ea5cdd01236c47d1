/**
 * history command - Show the change timeline of one resource type
 */

import chalk from "chalk";
import { deriveVersionSummary } from "../../core/index.js";
import { createLogger } from "../../utils/index.js";
import { openTracker, printHeader } from "./shared.js";

const logger = createLogger("history");

export interface HistoryOptions {
  limit?: number;
}

export async function historyCommand(typeName: string, options: HistoryOptions): Promise<void> {
  logger.info({ typeName, options }, "Showing history");

  const { ledger, history, store } = await openTracker();
  const record = ledger.get(typeName);
  const removals = ledger.getRemoved(typeName);

  printHeader(typeName);

  console.log();
  console.log(chalk.white.bold("Ledger"));
  if (record) {
    console.log(`  First seen:    ${record.firstSeen}`);
    console.log(`  Last updated:  ${record.lastUpdated}`);
    if (record.metadata.timeCreated) {
      console.log(`  Registered:    ${record.metadata.timeCreated}`);
    }
    if (record.metadata.deprecatedStatus) {
      console.log(`  Status:        ${record.metadata.deprecatedStatus}`);
    }
    console.log(`  File:          ${chalk.dim(store.nameFor(typeName))}`);
  } else if (removals.length === 0) {
    console.log(chalk.yellow("  Not tracked"));
  } else {
    console.log(chalk.magenta("  Not in the registry (removed)"));
  }

  for (const removal of removals) {
    console.log(
      `  ${chalk.magenta("removed")} ${removal.removedDate} ${chalk.dim(`(seen ${removal.firstSeen} to ${removal.lastUpdated})`)}`
    );
  }

  if (!history) {
    console.log();
    console.log(chalk.dim("History is disabled (historyBackend: none)"));
    return;
  }

  const summary = await deriveVersionSummary(history, typeName, options.limit ?? 5);
  console.log();
  console.log(chalk.white.bold(`History (${summary.totalUpdates} update(s))`));
  if (summary.history.length === 0) {
    console.log(chalk.dim("  No recorded changes"));
  }
  for (const point of summary.history) {
    console.log(`  ${chalk.dim(point.commit)}  ${point.timestamp}`);
  }
  console.log();
}
