/**
 * History Log Models
 *
 * One entry per pass that changed at least one stored document. Entries are
 * content-addressed: the commit id is the SHA-256 of the canonical form of
 * everything else in the entry, parent id included, so the log forms a hash
 * chain.
 */

import { z } from "zod";
import { canonicalJson } from "../../document-store/models/canonical.js";
import { calculateContentHash } from "../../../utils/fs.js";

export const HistoryChangeSchema = z.object({
  entityId: z.string().min(1),
  /** Blob name of the stored document */
  path: z.string().min(1),
  /** SHA-256 of the canonical document bytes; absent when the backend cannot report it */
  contentHash: z.string().optional(),
});

export type HistoryChange = z.infer<typeof HistoryChangeSchema>;

export const HistoryEntrySchema = z.object({
  commitId: z.string().min(1),
  parentId: z.string().nullable(),
  timestamp: z.string().datetime({ offset: true }),
  message: z.string(),
  changes: z.array(HistoryChangeSchema),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

/**
 * What a caller hands to `append`; the log assigns parent and commit id
 */
export interface NewHistoryEntry {
  timestamp: string;
  message: string;
  changes: HistoryChange[];
}

/**
 * One point on an entity's change timeline
 */
export interface TimelinePoint {
  commitId: string;
  timestamp: string;
}

export function passMessage(timestamp: string): string {
  return `Schema update: ${timestamp}`;
}

function byPath(a: HistoryChange, b: HistoryChange): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * Content address of an entry
 */
export function computeCommitId(entry: Omit<HistoryEntry, "commitId">): string {
  return calculateContentHash(canonicalJson(entry));
}

/**
 * Build a content-addressed entry chained onto `parentId`
 */
export function createHistoryEntry(input: NewHistoryEntry, parentId: string | null): HistoryEntry {
  const body = {
    parentId,
    timestamp: input.timestamp,
    message: input.message,
    changes: [...input.changes].sort(byPath),
  };
  return { commitId: computeCommitId(body), ...body };
}

/**
 * True when `key` names the change, by entity id or by blob name
 */
export function changeMatches(change: HistoryChange, key: string): boolean {
  return change.entityId === key || change.path === key;
}
