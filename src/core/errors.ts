/**
 * Error Classes for cfn-schema-ledger
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Pass lifecycle errors (1xxx)
  PASS_ALREADY_RUNNING = "E1001",

  // Catalog errors (2xxx)
  CATALOG_ENUMERATION_FAILED = "E2000",
  CATALOG_FETCH_FAILED = "E2001",
  CATALOG_FETCH_TIMEOUT = "E2002",

  // Document store errors (3xxx)
  STORE_WRITE_FAILED = "E3000",

  // Ledger errors (4xxx)
  LEDGER_LOAD_FAILED = "E4000",
  LEDGER_PERSIST_FAILED = "E4001",

  // History log errors (5xxx)
  HISTORY_APPEND_FAILED = "E5000",
  HISTORY_READ_FAILED = "E5001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all cfn-schema-ledger errors
 */
export class SchemaLedgerError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SchemaLedgerError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Create a formatted error message
   */
  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * The catalog could not be listed. Fatal: no fetch starts and no removal is reconciled.
 */
export class EnumerationError extends SchemaLedgerError {
  constructor(cause: unknown) {
    super(
      `Failed to enumerate catalog: ${describeCause(cause)}`,
      ErrorCode.CATALOG_ENUMERATION_FAILED,
      undefined,
      { cause }
    );
    this.name = "EnumerationError";
  }
}

/**
 * Fetching one entity failed or timed out. The entity is skipped for this pass.
 */
export class TransientFetchError extends SchemaLedgerError {
  public readonly entityId: string;

  constructor(entityId: string, cause: unknown, timedOut = false) {
    super(
      `Failed to fetch ${entityId}: ${describeCause(cause)}`,
      timedOut ? ErrorCode.CATALOG_FETCH_TIMEOUT : ErrorCode.CATALOG_FETCH_FAILED,
      { entityId },
      { cause }
    );
    this.name = "TransientFetchError";
    this.entityId = entityId;
  }
}

/**
 * Persisting one document failed. The entity is skipped for this pass.
 */
export class StoreWriteError extends SchemaLedgerError {
  public readonly entityId: string;
  public readonly filePath?: string;

  constructor(entityId: string, cause: unknown, filePath?: string) {
    super(
      `Failed to store ${entityId}: ${describeCause(cause)}`,
      ErrorCode.STORE_WRITE_FAILED,
      { entityId, filePath },
      { cause }
    );
    this.name = "StoreWriteError";
    this.entityId = entityId;
    this.filePath = filePath;
  }
}

/**
 * A ledger file exists but cannot be read or does not match the expected shape
 */
export class LedgerLoadError extends SchemaLedgerError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: unknown) {
    super(`Failed to load ledger file ${filePath}: ${reason}`, ErrorCode.LEDGER_LOAD_FAILED, { filePath }, { cause });
    this.name = "LedgerLoadError";
    this.filePath = filePath;
  }
}

/**
 * The durable ledger write failed. Fatal to the pass; previous files stay valid.
 */
export class LedgerPersistError extends SchemaLedgerError {
  constructor(cause: unknown) {
    super(`Failed to persist ledger: ${describeCause(cause)}`, ErrorCode.LEDGER_PERSIST_FAILED, undefined, { cause });
    this.name = "LedgerPersistError";
  }
}

/**
 * History log errors
 */
export class HistoryLogError extends SchemaLedgerError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.HISTORY_APPEND_FAILED,
    cause?: unknown
  ) {
    super(message, code, undefined, { cause });
    this.name = "HistoryLogError";
  }
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigurationError extends SchemaLedgerError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCode.CONFIGURATION_ERROR, { issues });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Another process holds the pass lock for this data directory
 */
export class ConcurrentPassError extends SchemaLedgerError {
  public readonly lockPath: string;

  constructor(lockPath: string) {
    super(`Another sync pass is running (lock file ${lockPath})`, ErrorCode.PASS_ALREADY_RUNNING, { lockPath });
    this.name = "ConcurrentPassError";
    this.lockPath = lockPath;
  }
}

/**
 * Check if an error is a SchemaLedgerError
 */
export function isSchemaLedgerError(error: unknown): error is SchemaLedgerError {
  return error instanceof SchemaLedgerError;
}
