/**
 * Snapshot Runner Implementation
 *
 * Fetches run in a bounded worker pool. Each worker stores the document and
 * records the observation before taking the next id, so ledger mutations
 * are serialized on the event loop and never interleave within one entity.
 * Ids that failed to fetch or store stay out of the processed count but are
 * still treated as present when removals are reconciled, so a transient
 * failure never archives a type.
 */

import type {
  ISnapshotRunner,
  PassError,
  PassProgressListener,
  PassSummary,
  SnapshotRunnerConfig,
} from "../interfaces/ISnapshotRunner.js";
import type { CatalogEntry, FetchedEntity, ICatalogClient } from "../../catalog/interfaces/ICatalogClient.js";
import type { DocumentWriteResult, IDocumentStore } from "../../document-store/interfaces/IDocumentStore.js";
import type { IVersionLedger } from "../../ledger/interfaces/IVersionLedger.js";
import {
  normalizeProviderMetadata,
  type ObservationKind,
} from "../../ledger/models/version-record.js";
import type { IHistoryLog } from "../../history/interfaces/IHistoryLog.js";
import type { HistoryChange } from "../../history/models/history-entry.js";
import { EnumerationError, StoreWriteError, TransientFetchError } from "../../errors.js";
import { err, ok, type Result } from "../../../types/result.js";
import { mapConcurrent, timeout, TimeoutError } from "../../../utils/async.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("snapshot-runner");

export interface SnapshotRunnerDependencies {
  catalog: ICatalogClient;
  store: IDocumentStore;
  ledger: IVersionLedger;
  /** Null disables history */
  history: IHistoryLog | null;
}

interface Observation {
  entityId: string;
  kind: ObservationKind;
  write: DocumentWriteResult;
}

type EntityOutcome = Result<Observation, TransientFetchError | StoreWriteError>;

/**
 * Keep the first occurrence of every id
 */
export function dedupeEntries(entries: readonly CatalogEntry[]): { unique: CatalogEntry[]; duplicates: number } {
  const seen = new Set<string>();
  const unique: CatalogEntry[] = [];
  for (const entry of entries) {
    if (seen.has(entry.id)) continue;
    seen.add(entry.id);
    unique.push(entry);
  }
  return { unique, duplicates: entries.length - unique.length };
}

export class SnapshotRunner implements ISnapshotRunner {
  constructor(
    private readonly deps: SnapshotRunnerDependencies,
    private readonly config: SnapshotRunnerConfig
  ) {}

  async run(onProgress?: PassProgressListener): Promise<PassSummary> {
    const startedAt = Date.now();
    const now = this.config.clock();
    const timestamp = now.toISOString();

    const listed = await this.enumerate();
    const { unique, duplicates } = dedupeEntries(listed);
    if (duplicates > 0) {
      logger.warn({ duplicates }, "Catalog listed duplicate ids; keeping first occurrences");
    }
    logger.info({ total: unique.length, timestamp }, "Starting pass");

    let done = 0;
    const outcomes = await mapConcurrent(
      unique,
      async (entry) => {
        const outcome = await this.processEntity(entry, now);
        done++;
        onProgress?.({ done, total: unique.length, entityId: entry.id });
        if (done % this.config.progressInterval === 0) {
          logger.info({ done, total: unique.length }, "Pass progress");
        }
        return outcome;
      },
      this.config.concurrency
    );

    const observedIds = new Set<string>();
    const failedIds = new Set<string>();
    const addedIds: string[] = [];
    const changedIds: string[] = [];
    const changes: HistoryChange[] = [];
    const errors: PassError[] = [];
    let unchanged = 0;

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        const error = outcome.error;
        errors.push({ id: error.entityId, code: error.code, message: error.message });
        failedIds.add(error.entityId);
        continue;
      }
      const { entityId, kind, write } = outcome.value;
      observedIds.add(entityId);
      if (kind === "added") addedIds.push(entityId);
      else if (kind === "changed") changedIds.push(entityId);
      else unchanged++;
      if (kind !== "unchanged") {
        changes.push({ entityId, path: write.name, contentHash: write.contentHash });
      }
    }

    const presentIds = new Set([...observedIds, ...failedIds]);
    const removedIds = this.deps.ledger.reconcileRemovals(presentIds, now);
    await this.deps.ledger.persist();

    let historyCommitId: string | null = null;
    if (this.deps.history && changes.length > 0) {
      const entry = await this.deps.history.commitPass(changes, now);
      historyCommitId = entry?.commitId ?? null;
    }

    const summary: PassSummary = {
      timestamp,
      enumerated: listed.length,
      duplicates,
      processed: observedIds.size,
      added: addedIds.length,
      changed: changedIds.length,
      unchanged,
      removed: removedIds.length,
      errored: errors.length,
      addedIds: addedIds.sort(),
      changedIds: changedIds.sort(),
      removedIds,
      errors,
      historyCommitId,
      durationMs: Date.now() - startedAt,
    };

    logger.info(
      {
        processed: summary.processed,
        added: summary.added,
        changed: summary.changed,
        removed: summary.removed,
        errored: summary.errored,
        durationMs: summary.durationMs,
      },
      "Pass complete"
    );
    return summary;
  }

  private async enumerate(): Promise<CatalogEntry[]> {
    const entries: CatalogEntry[] = [];
    try {
      for await (const entry of this.deps.catalog.listEntities()) {
        entries.push(entry);
      }
    } catch (error) {
      logger.error({ err: error }, "Catalog enumeration failed");
      throw new EnumerationError(error);
    }
    return entries;
  }

  private async processEntity(entry: CatalogEntry, now: Date): Promise<EntityOutcome> {
    const entityId = entry.id;

    let fetched: FetchedEntity;
    try {
      fetched = await timeout(
        this.deps.catalog.fetchEntity(entityId),
        this.config.fetchTimeoutMs,
        `Fetch timed out after ${this.config.fetchTimeoutMs}ms`
      );
    } catch (error) {
      const failure = new TransientFetchError(entityId, error, error instanceof TimeoutError);
      logger.warn({ typeName: entityId, err: error }, "Skipping type: fetch failed");
      return err(failure);
    }

    let write: DocumentWriteResult;
    try {
      write = await this.deps.store.write(entityId, fetched.document);
    } catch (error) {
      const failure = error instanceof StoreWriteError ? error : new StoreWriteError(entityId, error);
      logger.error({ typeName: entityId, err: error }, "Skipping type: store write failed");
      return err(failure);
    }

    const metadata = {
      ...normalizeProviderMetadata(entry.metadata),
      ...normalizeProviderMetadata(fetched.metadata),
    };
    const kind = this.deps.ledger.recordObservation(entityId, write.changed, now, metadata, write.contentHash);
    if (kind !== "unchanged") {
      logger.debug({ typeName: entityId, kind }, "Schema recorded");
    }
    return ok({ entityId, kind, write });
  }
}
