/**
 * removed command - List archived resource types
 */

import chalk from "chalk";
import { createLogger } from "../../utils/index.js";
import { openTracker, printHeader } from "./shared.js";

const logger = createLogger("removed");

export async function removedCommand(): Promise<void> {
  logger.info("Listing removed types");

  const { ledger } = await openTracker();
  const archive = ledger.removedEntries();

  printHeader(`Removed Types (${archive.length})`);
  console.log();

  if (archive.length === 0) {
    console.log(chalk.dim("  No type has been removed"));
    console.log();
    return;
  }

  for (const [id, removals] of archive) {
    const active = ledger.get(id) ? chalk.green(" (back in registry)") : "";
    console.log(`  ${chalk.magenta(id)}${active}`);
    for (const removal of removals) {
      console.log(chalk.dim(`    removed ${removal.removedDate}, last updated ${removal.lastUpdated}`));
    }
  }
  console.log();
}
