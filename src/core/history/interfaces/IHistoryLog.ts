/**
 * History Log Interface
 *
 * Append-only, totally ordered record of document changes. Everything about
 * a single entity (latest change, number of changes, first appearance) is
 * derived from the log on demand and never stored next to it.
 */

import type {
  HistoryChange,
  HistoryEntry,
  NewHistoryEntry,
  TimelinePoint,
} from "../models/history-entry.js";

export type HistoryLogBackend = "memory" | "file" | "git";

export interface IHistoryLog {
  readonly backend: HistoryLogBackend;

  /**
   * Append one entry after the current head. Never touches earlier entries.
   *
   * @throws {HistoryLogError}
   */
  append(entry: NewHistoryEntry): Promise<HistoryEntry>;

  /** Every entry, oldest first */
  entries(): Promise<HistoryEntry[]>;

  /** Most recent entry, or null for an empty log */
  head(): Promise<HistoryEntry | null>;

  /** Commits that touched `key` (entity id or blob name), oldest first */
  queryHistory(key: string): Promise<TimelinePoint[]>;

  /** Distinct change timestamps for `key`, oldest first; empty when unknown */
  queryTimeline(key: string): Promise<string[]>;

  /** Most recent change timestamp, or null */
  latest(key: string): Promise<string | null>;

  /** Number of recorded changes; 0 when unknown */
  count(key: string): Promise<number>;

  /** Earliest change timestamp, or null */
  firstSeen(key: string): Promise<string | null>;

  /**
   * Record one pass. Appends nothing and returns null when `changes` is empty.
   */
  commitPass(changes: HistoryChange[], timestamp: Date): Promise<HistoryEntry | null>;
}

/**
 * Per-entity report derived from the log
 */
export interface VersionSummary {
  latestUpdate: string | null;
  firstSeen: string | null;
  totalUpdates: number;
  /** Newest first, shortened commit ids */
  history: Array<{ commit: string; timestamp: string }>;
}
