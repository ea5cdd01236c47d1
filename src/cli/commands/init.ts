/**
 * init command - Write a configuration file for the current project
 */

import chalk from "chalk";
import ora from "ora";
import * as path from "node:path";
import {
  parseTrackerConfig,
  resolveTrackerPaths,
  saveTrackerConfig,
} from "../../core/config.js";
import {
  ensureDirectory,
  fileExists,
  getConfigPath,
  getProjectRoot,
  createLogger,
} from "../../utils/index.js";

const logger = createLogger("init");

export interface InitOptions {
  force?: boolean;
}

/**
 * Initialize the mirror for the current project
 */
export async function initCommand(options: InitOptions): Promise<void> {
  const projectRoot = getProjectRoot();
  const configPath = getConfigPath(projectRoot);

  logger.info({ options }, "Starting initialization");

  // Check if already initialized
  if ((await fileExists(configPath)) && !options.force) {
    console.log(chalk.yellow("cfn-schema-ledger is already initialized in this project."));
    console.log(chalk.dim("Use --force to reinitialize."));
    logger.info("Already initialized, skipping");
    return;
  }

  const spinner = ora("Initializing cfn-schema-ledger...").start();

  try {
    const config = parseTrackerConfig({});
    const paths = resolveTrackerPaths(projectRoot, config);

    spinner.text = "Creating directory structure...";
    await ensureDirectory(paths.schemasDir);

    spinner.text = "Writing configuration...";
    await saveTrackerConfig(projectRoot, config);
    logger.info({ configPath }, "Configuration saved");

    spinner.succeed(chalk.green("cfn-schema-ledger initialized successfully!"));

    console.log();
    console.log(chalk.dim("Configuration:"));
    console.log(chalk.dim(`  Config:     ${path.relative(projectRoot, configPath)}`));
    console.log(chalk.dim(`  Data dir:   ${path.relative(projectRoot, paths.dataDir)}`));
    console.log(chalk.dim(`  History:    ${config.historyBackend}`));
    console.log(chalk.dim(`  Prefix:     ${config.typePrefix}`));

    console.log();
    console.log(chalk.cyan("Next steps:"));
    console.log(
      chalk.dim("  1. Make AWS credentials available (environment, profile or SSO)")
    );
    console.log(
      chalk.dim("  2. Run"),
      chalk.white("cfn-schema-ledger sync"),
      chalk.dim("to take the first snapshot")
    );
  } catch (error) {
    spinner.fail(chalk.red("Failed to initialize cfn-schema-ledger"));
    logger.error({ err: error }, "Initialization failed");
    throw error;
  }
}
