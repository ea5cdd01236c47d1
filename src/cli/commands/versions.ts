/**
 * versions command - List tracked types by their latest schema change
 */

import chalk from "chalk";
import { deriveVersionSummary } from "../../core/index.js";
import { createLogger } from "../../utils/index.js";
import { openTracker, printHeader } from "./shared.js";

const logger = createLogger("versions");

export interface VersionsOptions {
  limit?: number;
  prefix?: string;
}

/**
 * Most recently changed types first, with update counts from the history log
 */
export async function versionsCommand(options: VersionsOptions): Promise<void> {
  logger.info({ options }, "Listing versions");

  const { ledger, history } = await openTracker();
  const limit = options.limit ?? 20;

  const rows = ledger
    .entries()
    .filter(([id]) => !options.prefix || id.startsWith(options.prefix))
    .sort(([aId, a], [bId, b]) =>
      a.lastUpdated === b.lastUpdated ? (aId < bId ? -1 : 1) : a.lastUpdated < b.lastUpdated ? 1 : -1
    );

  printHeader(`Schema Versions (${Math.min(limit, rows.length)} of ${rows.length})`);
  console.log();

  if (rows.length === 0) {
    console.log(chalk.yellow("  No types recorded yet"));
    return;
  }

  for (const [id, record] of rows.slice(0, limit)) {
    let updates = "";
    if (history) {
      const summary = await deriveVersionSummary(history, id, 0);
      updates = chalk.dim(` ${summary.totalUpdates} update(s)`);
    }
    const deprecated = record.metadata.deprecatedStatus === "DEPRECATED" ? chalk.yellow(" deprecated") : "";
    console.log(`  ${record.lastUpdated}  ${chalk.cyan(id)}${updates}${deprecated}`);
  }

  if (rows.length > limit) {
    console.log(chalk.dim(`  ... and ${rows.length - limit} more (use --limit)`));
  }
  console.log();
}
