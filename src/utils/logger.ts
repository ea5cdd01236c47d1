/**
 * Logger Module
 * Structured logging using pino with file and console output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Write to `<logDir>/cfn-schema-ledger.log` instead of stderr */
  logDir?: string;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Ensures the log directory exists
 */
function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isTestRun(): boolean {
  return process.env.VITEST !== undefined || process.env.NODE_ENV === "test";
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTestRun()) return "silent";
  return "info";
}

/**
 * Build the root logger. Output goes to stderr so it never mixes with
 * command output; `LOG_DIR` switches to file output.
 */
export function buildLogger(options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), logDir = process.env.LOG_DIR } = options;
  const baseOptions: pino.LoggerOptions = { name: "cfn-schema-ledger", level };

  if (logDir) {
    ensureLogDir(logDir);
    const destination = pino.destination({
      dest: path.join(logDir, "cfn-schema-ledger.log"),
      sync: false,
    });
    return pino(baseOptions, destination);
  }

  // Tests stay on plain pino so no transport worker outlives the run
  if (isDevelopment() && !isTestRun()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

let baseLogger: PinoLogger | null = null;

function getBaseLogger(): PinoLogger {
  if (!baseLogger) {
    baseLogger = buildLogger();
  }
  return baseLogger;
}

/**
 * Create a child logger for a specific module
 *
 * @example
 * ```typescript
 * const logger = createLogger("ledger");
 * logger.info({ typeName: "AWS::S3::Bucket" }, "Schema changed");
 * logger.error({ err }, "Failed to persist ledger");
 * ```
 */
export function createLogger(moduleName: string): PinoLogger {
  return getBaseLogger().child({ module: moduleName });
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
