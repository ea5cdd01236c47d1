/**
 * Version Ledger Interface
 *
 * The ledger is the sole owner of version and removal records. It is an
 * explicit state object: load once, apply one pass of observations, reconcile
 * removals, persist.
 */

import type { MetadataPolicy } from "../../../utils/validation.js";
import type {
  LedgerState,
  ObservationKind,
  RawProviderMetadata,
  RemovedRecord,
  VersionRecord,
} from "../models/version-record.js";

/**
 * Configuration for a version ledger
 */
export interface VersionLedgerConfig {
  /** Fixed for the lifetime of a deployment; never chosen per call */
  metadataPolicy: MetadataPolicy;
}

export const DEFAULT_VERSION_LEDGER_CONFIG: VersionLedgerConfig = {
  metadataPolicy: "always",
};

/**
 * Durable storage for the full ledger state
 */
export interface ILedgerStorage {
  /** Missing files load as an empty state */
  load(): Promise<LedgerState>;

  /** All-or-nothing write of both record sets with stable key order */
  save(state: LedgerState): Promise<void>;
}

export interface IVersionLedger {
  readonly config: VersionLedgerConfig;

  /**
   * Replace in-memory state with the durable one
   *
   * @throws {LedgerLoadError}
   */
  load(): Promise<void>;

  /**
   * Record that `entityId` was fetched and stored in the current pass.
   *
   * With `contentHash`, a record whose stored hash differs counts as changed
   * even when the store reported no change.
   */
  recordObservation(
    entityId: string,
    changed: boolean,
    now: Date,
    metadata?: RawProviderMetadata,
    contentHash?: string
  ): ObservationKind;

  /**
   * Archive every active record whose id is not in `currentIds`. Call once per
   * pass, after every observation of the pass has been recorded.
   *
   * @returns archived ids, sorted
   */
  reconcileRemovals(currentIds: ReadonlySet<string>, now: Date): string[];

  /**
   * @throws {LedgerPersistError}
   */
  persist(): Promise<void>;

  get(entityId: string): VersionRecord | undefined;

  /** Removal history of an id, oldest first; empty when never removed */
  getRemoved(entityId: string): RemovedRecord[];

  /** Active records sorted by id */
  entries(): Array<[string, VersionRecord]>;

  /** Archive sorted by id */
  removedEntries(): Array<[string, RemovedRecord[]]>;

  /** Number of active records */
  readonly size: number;

  /** Deep copy of the current state */
  snapshot(): LedgerState;
}
