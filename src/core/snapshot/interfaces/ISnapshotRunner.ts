/**
 * Snapshot Runner Interface
 *
 * One pass: enumerate the catalog, fetch and store every entity, record
 * observations, archive what disappeared, persist, and append history.
 */

import type { ErrorCode } from "../../errors.js";

export interface SnapshotRunnerConfig {
  /** Parallel fetch-and-store workers */
  concurrency: number;
  /** Upper bound for one fetch */
  fetchTimeoutMs: number;
  /** Log progress every N processed entities */
  progressInterval: number;
  /** Source of the pass timestamp */
  clock: () => Date;
}

export const DEFAULT_SNAPSHOT_RUNNER_CONFIG: SnapshotRunnerConfig = {
  concurrency: 4,
  fetchTimeoutMs: 30_000,
  progressInterval: 100,
  clock: () => new Date(),
};

/**
 * A per-entity failure that did not abort the pass
 */
export interface PassError {
  id: string;
  code: ErrorCode;
  message: string;
}

export interface PassSummary {
  /** The single timestamp applied to every record touched by the pass */
  timestamp: string;
  /** Entries listed by the catalog, duplicates included */
  enumerated: number;
  duplicates: number;
  /** Entities fetched and stored successfully */
  processed: number;
  added: number;
  changed: number;
  unchanged: number;
  removed: number;
  errored: number;
  addedIds: string[];
  changedIds: string[];
  removedIds: string[];
  errors: PassError[];
  /** Null when no history log is configured or nothing changed */
  historyCommitId: string | null;
  durationMs: number;
}

/**
 * Progress callback, called after each processed entity
 */
export type PassProgressListener = (progress: { done: number; total: number; entityId: string }) => void;

export interface ISnapshotRunner {
  /**
   * Run one complete pass
   *
   * @throws {EnumerationError} when the catalog cannot be listed; nothing is written
   * @throws {LedgerPersistError}
   * @throws {HistoryLogError}
   */
  run(onProgress?: PassProgressListener): Promise<PassSummary>;
}
