/**
 * In-memory history log for tests and dry runs
 */

import { BaseHistoryLog } from "./BaseHistoryLog.js";
import { createHistoryEntry, type HistoryEntry, type NewHistoryEntry } from "../models/history-entry.js";

export class InMemoryHistoryLog extends BaseHistoryLog {
  readonly backend = "memory" as const;
  private readonly log: HistoryEntry[] = [];

  async entries(): Promise<HistoryEntry[]> {
    return this.log.map((entry) => ({ ...entry, changes: entry.changes.map((change) => ({ ...change })) }));
  }

  async append(input: NewHistoryEntry): Promise<HistoryEntry> {
    const parent = this.log[this.log.length - 1];
    const entry = createHistoryEntry(input, parent?.commitId ?? null);
    this.log.push(entry);
    return entry;
  }
}
