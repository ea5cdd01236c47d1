/**
 * History Log Module
 *
 * Append-only record of schema changes with derived per-type timelines.
 *
 * @module
 */

// Models
export * from "./models/history-entry.js";

// Interfaces
export * from "./interfaces/IHistoryLog.js";

// Implementation
export { BaseHistoryLog } from "./impl/BaseHistoryLog.js";
export { FileHistoryLog } from "./impl/FileHistoryLog.js";
export { InMemoryHistoryLog } from "./impl/InMemoryHistoryLog.js";
export {
  GitHistoryLog,
  parseGitLogLines,
  parseGitLogEntries,
  normalizeGitDate,
  toGitDate,
  type GitHistoryLogOptions,
} from "./impl/GitHistoryLog.js";

import type { IHistoryLog, VersionSummary } from "./interfaces/IHistoryLog.js";
import { FileHistoryLog } from "./impl/FileHistoryLog.js";
import { GitHistoryLog } from "./impl/GitHistoryLog.js";
import type { HistoryBackend } from "../../utils/validation.js";

/** Number of characters kept from a commit id in reports */
export const SHORT_COMMIT_LENGTH = 8;

/**
 * Build the per-type version report from the log
 *
 * `history` holds at most `limit` points, newest first.
 */
export async function deriveVersionSummary(
  log: IHistoryLog,
  key: string,
  limit = 5
): Promise<VersionSummary> {
  const points = await log.queryHistory(key);
  const timeline = await log.queryTimeline(key);

  return {
    latestUpdate: timeline[timeline.length - 1] ?? null,
    firstSeen: timeline[0] ?? null,
    totalUpdates: timeline.length,
    history: (limit > 0 ? points.slice(-limit) : [])
      .reverse()
      .map((point) => ({ commit: point.commitId.slice(0, SHORT_COMMIT_LENGTH), timestamp: point.timestamp })),
  };
}

/**
 * Create the configured history log; `none` disables history
 */
export function createHistoryLog(
  backend: HistoryBackend,
  paths: { dataDir: string; schemasDir: string; historyFile: string }
): IHistoryLog | null {
  switch (backend) {
    case "none":
      return null;
    case "file":
      return new FileHistoryLog(paths.historyFile);
    case "git":
      return new GitHistoryLog({ repoPath: paths.dataDir, schemasDir: paths.schemasDir });
  }
}
