/**
 * Tracker configuration loading
 *
 * Reads `.schema-ledger/config.json`, applies defaults through the zod
 * schema and resolves the data paths against the project root.
 */

import * as path from "node:path";
import { getConfigPath, readFileIfExists, writeFileAtomic, createLogger } from "../utils/index.js";
import {
  TrackerConfigSchema,
  safeValidate,
  formatZodError,
  type TrackerConfig,
  type TrackerConfigInput,
} from "../utils/validation.js";
import { ConfigurationError } from "./errors.js";

const logger = createLogger("config");

/**
 * Absolute locations derived from a {@link TrackerConfig}
 */
export interface TrackerPaths {
  dataDir: string;
  schemasDir: string;
  versionFile: string;
  removedFile: string;
  historyFile: string;
  lockFile: string;
}

export const VERSION_FILE_NAME = "version_metadata.json";
export const REMOVED_FILE_NAME = "removed_schemas.json";
export const HISTORY_FILE_NAME = "history.jsonl";
export const LOCK_FILE_NAME = ".sync.lock";

/**
 * Validate a raw configuration object, filling defaults
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function parseTrackerConfig(raw: unknown): TrackerConfig {
  const result = safeValidate(TrackerConfigSchema, raw ?? {});
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Load the project configuration. A missing file yields the defaults.
 */
export async function loadTrackerConfig(
  projectRoot: string,
  overrides: TrackerConfigInput = {}
): Promise<TrackerConfig> {
  const configPath = getConfigPath(projectRoot);
  const content = await readFileIfExists(configPath);

  let fromFile: Record<string, unknown> = {};
  if (content) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content.toString("utf-8"));
    } catch (error) {
      throw new ConfigurationError(
        `Configuration file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigurationError(`Configuration file ${configPath} must contain a JSON object`);
    }
    fromFile = parsed;
  } else {
    logger.debug({ configPath }, "No configuration file, using defaults");
  }

  return parseTrackerConfig({ ...fromFile, ...stripUndefined(overrides) });
}

/**
 * Write a configuration file with every default spelled out
 */
export async function saveTrackerConfig(projectRoot: string, config: TrackerConfig): Promise<string> {
  const configPath = getConfigPath(projectRoot);
  await writeFileAtomic(configPath, JSON.stringify(config, null, 2) + "\n");
  return configPath;
}

export function resolveTrackerPaths(projectRoot: string, config: TrackerConfig): TrackerPaths {
  const dataDir = path.resolve(projectRoot, config.dataDir);
  return {
    dataDir,
    schemasDir: path.join(dataDir, config.schemasDir),
    versionFile: path.join(dataDir, VERSION_FILE_NAME),
    removedFile: path.join(dataDir, REMOVED_FILE_NAME),
    historyFile: path.join(dataDir, HISTORY_FILE_NAME),
    lockFile: path.join(dataDir, LOCK_FILE_NAME),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripUndefined(input: TrackerConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}
