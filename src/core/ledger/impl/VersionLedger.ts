/**
 * Version Ledger Implementation
 *
 * Per-entity state machine: created on first observation, `lastUpdated`
 * bumped only on content change, moved into the removal archive when absent
 * from a complete pass. A later reappearance starts a fresh record; the
 * archive is never rewritten.
 */

import type { ILedgerStorage, IVersionLedger, VersionLedgerConfig } from "../interfaces/IVersionLedger.js";
import {
  cloneRemovedRecord,
  cloneVersionRecord,
  createEmptyLedgerState,
  normalizeProviderMetadata,
  type LedgerState,
  type ObservationKind,
  type RawProviderMetadata,
  type RemovedRecord,
  type VersionRecord,
} from "../models/version-record.js";
import { LedgerPersistError, isSchemaLedgerError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("version-ledger");

function byKey<T>([a]: [string, T], [b]: [string, T]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class VersionLedger implements IVersionLedger {
  private versions = new Map<string, VersionRecord>();
  private removed = new Map<string, RemovedRecord[]>();

  constructor(
    private readonly storage: ILedgerStorage,
    readonly config: VersionLedgerConfig
  ) {}

  get size(): number {
    return this.versions.size;
  }

  async load(): Promise<void> {
    const state = await this.storage.load();
    this.versions = state.versions;
    this.removed = state.removed;
    logger.debug({ active: this.versions.size, removed: this.removed.size }, "Ledger loaded");
  }

  recordObservation(
    entityId: string,
    changed: boolean,
    now: Date,
    rawMetadata?: RawProviderMetadata,
    contentHash?: string
  ): ObservationKind {
    const timestamp = now.toISOString();
    const metadata = normalizeProviderMetadata(rawMetadata);
    const existing = this.versions.get(entityId);

    if (!existing) {
      const record: VersionRecord = { firstSeen: timestamp, lastUpdated: timestamp, metadata };
      if (contentHash !== undefined) record.contentHash = contentHash;
      this.versions.set(entityId, record);
      return "added";
    }

    // The store may already hold content this record never accounted for,
    // e.g. after a pass whose persist failed
    const drifted =
      contentHash !== undefined && existing.contentHash !== undefined && existing.contentHash !== contentHash;
    const contentChanged = changed || drifted;
    if (drifted && !changed) {
      logger.info({ typeName: entityId }, "Stored schema differs from the recorded version");
    }

    if (contentChanged) {
      existing.lastUpdated = timestamp;
    }
    if (contentHash !== undefined) {
      existing.contentHash = contentHash;
    }

    if (contentChanged || this.config.metadataPolicy === "always") {
      existing.metadata = { ...existing.metadata, ...metadata };
    }

    return contentChanged ? "changed" : "unchanged";
  }

  reconcileRemovals(currentIds: ReadonlySet<string>, now: Date): string[] {
    const removedDate = now.toISOString();
    const removedIds: string[] = [];

    for (const [entityId, record] of this.versions) {
      if (currentIds.has(entityId)) continue;

      const history = this.removed.get(entityId) ?? [];
      history.push({ ...cloneVersionRecord(record), removedDate });
      this.removed.set(entityId, history);
      removedIds.push(entityId);
    }

    for (const entityId of removedIds) {
      this.versions.delete(entityId);
      logger.info({ typeName: entityId, removedDate }, "Schema removed");
    }

    return removedIds.sort();
  }

  async persist(): Promise<void> {
    try {
      await this.storage.save(this.snapshot());
    } catch (error) {
      throw isSchemaLedgerError(error) ? error : new LedgerPersistError(error);
    }
  }

  get(entityId: string): VersionRecord | undefined {
    const record = this.versions.get(entityId);
    return record ? cloneVersionRecord(record) : undefined;
  }

  getRemoved(entityId: string): RemovedRecord[] {
    return (this.removed.get(entityId) ?? []).map(cloneRemovedRecord);
  }

  entries(): Array<[string, VersionRecord]> {
    return [...this.versions]
      .map(([id, record]): [string, VersionRecord] => [id, cloneVersionRecord(record)])
      .sort(byKey);
  }

  removedEntries(): Array<[string, RemovedRecord[]]> {
    return [...this.removed]
      .map(([id, history]): [string, RemovedRecord[]] => [id, history.map(cloneRemovedRecord)])
      .sort(byKey);
  }

  snapshot(): LedgerState {
    const state = createEmptyLedgerState();
    for (const [id, record] of this.entries()) state.versions.set(id, record);
    for (const [id, history] of this.removedEntries()) state.removed.set(id, history);
    return state;
  }
}
