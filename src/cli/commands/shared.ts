/**
 * Helpers shared by the CLI commands
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { createTracker, loadTrackerConfig, type Tracker } from "../../core/index.js";
import { fileExists, getConfigPath, getProjectRoot } from "../../utils/index.js";
import type { TrackerConfigInput } from "../../utils/validation.js";

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Format duration in human readable format
 */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds.toFixed(0)}s`;
}

/**
 * Load configuration (file plus overrides) and wire a tracker for the
 * current project
 */
export async function openTracker(overrides: TrackerConfigInput = {}): Promise<Tracker> {
  const projectRoot = getProjectRoot();
  const config = await loadTrackerConfig(projectRoot, overrides);
  return createTracker({ projectRoot, config });
}

/**
 * Print a hint when the project has no configuration file yet
 */
export async function warnIfNotInitialized(): Promise<void> {
  if (!(await fileExists(getConfigPath()))) {
    console.log(
      chalk.dim("No configuration file found, using defaults. Run"),
      chalk.white("cfn-schema-ledger init"),
      chalk.dim("to create one.")
    );
  }
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.cyan.bold(title));
  console.log(chalk.dim("─".repeat(40)));
}
