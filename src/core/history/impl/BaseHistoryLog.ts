/**
 * Shared derivations for history log backends
 *
 * Backends supply `append`, `entries` and, where they can answer it more
 * cheaply, `queryHistory`. Everything else is computed from those.
 */

import type { HistoryLogBackend, IHistoryLog } from "../interfaces/IHistoryLog.js";
import {
  changeMatches,
  passMessage,
  type HistoryChange,
  type HistoryEntry,
  type NewHistoryEntry,
  type TimelinePoint,
} from "../models/history-entry.js";

export abstract class BaseHistoryLog implements IHistoryLog {
  abstract readonly backend: HistoryLogBackend;

  abstract append(entry: NewHistoryEntry): Promise<HistoryEntry>;

  abstract entries(): Promise<HistoryEntry[]>;

  async head(): Promise<HistoryEntry | null> {
    const all = await this.entries();
    return all[all.length - 1] ?? null;
  }

  async queryHistory(key: string): Promise<TimelinePoint[]> {
    const all = await this.entries();
    return all
      .filter((entry) => entry.changes.some((change) => changeMatches(change, key)))
      .map((entry) => ({ commitId: entry.commitId, timestamp: entry.timestamp }));
  }

  async queryTimeline(key: string): Promise<string[]> {
    const timeline: string[] = [];
    for (const point of await this.queryHistory(key)) {
      if (timeline[timeline.length - 1] !== point.timestamp) {
        timeline.push(point.timestamp);
      }
    }
    return timeline;
  }

  async latest(key: string): Promise<string | null> {
    const timeline = await this.queryTimeline(key);
    return timeline[timeline.length - 1] ?? null;
  }

  async count(key: string): Promise<number> {
    return (await this.queryTimeline(key)).length;
  }

  async firstSeen(key: string): Promise<string | null> {
    const timeline = await this.queryTimeline(key);
    return timeline[0] ?? null;
  }

  async commitPass(changes: HistoryChange[], timestamp: Date): Promise<HistoryEntry | null> {
    if (changes.length === 0) return null;
    const iso = timestamp.toISOString();
    return this.append({ timestamp: iso, message: passMessage(iso), changes });
  }
}
