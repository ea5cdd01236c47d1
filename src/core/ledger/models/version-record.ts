/**
 * Version Ledger Models
 *
 * In-memory records are camelCase; the ledger files keep the snake_case
 * layout of `version_metadata.json` and `removed_schemas.json` as written by
 * earlier mirrors, so they load unchanged.
 */

import { z } from "zod";

// =============================================================================
// Provider Metadata
// =============================================================================

/**
 * Auxiliary fields reported by the registry. Only these keys are kept.
 */
export const ProviderMetadataSchema = z.object({
  /** When the type was registered (ISO-8601) */
  timeCreated: z.string().optional(),
  /** Registry deprecation status, e.g. LIVE or DEPRECATED */
  deprecatedStatus: z.string().optional(),
});

export type ProviderMetadata = z.infer<typeof ProviderMetadataSchema>;

/**
 * Metadata as a catalog client hands it over, before normalization
 */
export interface RawProviderMetadata {
  timeCreated?: Date | string | null;
  deprecatedStatus?: string | null;
  [key: string]: unknown;
}

const METADATA_KEYS = ["timeCreated", "deprecatedStatus"] as const satisfies readonly (keyof ProviderMetadata)[];

/**
 * Keep the known fields, turn dates into ISO strings, drop absent values
 */
export function normalizeProviderMetadata(raw: RawProviderMetadata | undefined): ProviderMetadata {
  const metadata: ProviderMetadata = {};
  if (!raw) return metadata;

  for (const key of METADATA_KEYS) {
    const value = raw[key];
    if (value instanceof Date) {
      if (!Number.isNaN(value.getTime())) metadata[key] = value.toISOString();
    } else if (typeof value === "string" && value.length > 0) {
      metadata[key] = value;
    }
  }
  return metadata;
}

// =============================================================================
// Records
// =============================================================================

export interface VersionRecord {
  /** Set once, when the id is first observed */
  firstSeen: string;
  /** Pass timestamp of the latest canonical content change */
  lastUpdated: string;
  /**
   * Hash of the canonical document this record last accounted for. Absent in
   * records written before hashes were kept.
   */
  contentHash?: string;
  metadata: ProviderMetadata;
}

export interface RemovedRecord extends VersionRecord {
  removedDate: string;
}

/**
 * Outcome of one observation
 */
export type ObservationKind = "added" | "changed" | "unchanged";

/**
 * Full ledger contents: active records plus the append-only removal archive
 */
export interface LedgerState {
  versions: Map<string, VersionRecord>;
  removed: Map<string, RemovedRecord[]>;
}

export function createEmptyLedgerState(): LedgerState {
  return { versions: new Map(), removed: new Map() };
}

// =============================================================================
// Stored Layout
// =============================================================================

export const StoredVersionRecordSchema = z.object({
  first_seen: z.string(),
  last_updated: z.string(),
  content_hash: z.string().optional(),
  time_created: z.string().optional(),
  deprecation_status: z.string().optional(),
});

export type StoredVersionRecord = z.infer<typeof StoredVersionRecordSchema>;

export const StoredRemovedRecordSchema = StoredVersionRecordSchema.extend({
  removed_date: z.string(),
});

export type StoredRemovedRecord = z.infer<typeof StoredRemovedRecordSchema>;

/** `version_metadata.json` */
export const VersionFileSchema = z.record(z.string(), StoredVersionRecordSchema);

/**
 * `removed_schemas.json`. Older files hold one record per id; they are read
 * as a one-element history.
 */
export const RemovedFileSchema = z.record(
  z.string(),
  z.union([
    z.array(StoredRemovedRecordSchema),
    StoredRemovedRecordSchema.transform((record) => [record]),
  ])
);

export function versionToStored(record: VersionRecord): StoredVersionRecord {
  return {
    first_seen: record.firstSeen,
    last_updated: record.lastUpdated,
    content_hash: record.contentHash,
    time_created: record.metadata.timeCreated,
    deprecation_status: record.metadata.deprecatedStatus,
  };
}

export function storedToVersion(stored: StoredVersionRecord): VersionRecord {
  const record: VersionRecord = {
    firstSeen: stored.first_seen,
    lastUpdated: stored.last_updated,
    metadata: normalizeProviderMetadata({
      timeCreated: stored.time_created,
      deprecatedStatus: stored.deprecation_status,
    }),
  };
  if (stored.content_hash !== undefined) record.contentHash = stored.content_hash;
  return record;
}

export function removedToStored(record: RemovedRecord): StoredRemovedRecord {
  return { ...versionToStored(record), removed_date: record.removedDate };
}

export function storedToRemoved(stored: StoredRemovedRecord): RemovedRecord {
  return { ...storedToVersion(stored), removedDate: stored.removed_date };
}

export function cloneVersionRecord(record: VersionRecord): VersionRecord {
  return { ...record, metadata: { ...record.metadata } };
}

export function cloneRemovedRecord(record: RemovedRecord): RemovedRecord {
  return { ...record, metadata: { ...record.metadata } };
}
