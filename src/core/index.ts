/**
 * Core module - Shared functionality behind the CLI
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./config.js";
export * from "./document-store/index.js";
export * from "./ledger/index.js";
export * from "./history/index.js";
export * from "./catalog/index.js";
export * from "./snapshot/index.js";

// Re-export types
export * from "../types/result.js";

import type { TrackerConfig } from "../utils/validation.js";
import { acquireLock } from "../utils/lock-manager.js";
import { createLogger } from "../utils/logger.js";
import { resolveTrackerPaths, type TrackerPaths } from "./config.js";
import { ConcurrentPassError } from "./errors.js";
import { createDocumentStore } from "./document-store/index.js";
import type { IDocumentStore } from "./document-store/interfaces/IDocumentStore.js";
import { createVersionLedger, FileLedgerStorage } from "./ledger/index.js";
import type { IVersionLedger } from "./ledger/interfaces/IVersionLedger.js";
import { createHistoryLog } from "./history/index.js";
import type { IHistoryLog } from "./history/interfaces/IHistoryLog.js";
import { createCloudFormationCatalog } from "./catalog/index.js";
import type { ICatalogClient } from "./catalog/interfaces/ICatalogClient.js";
import { createSnapshotRunner } from "./snapshot/index.js";
import type { PassProgressListener, PassSummary } from "./snapshot/interfaces/ISnapshotRunner.js";

const logger = createLogger("tracker");

// =============================================================================
// Tracker
// =============================================================================

export interface TrackerOptions {
  projectRoot: string;
  config: TrackerConfig;
  /** Defaults to the public CloudFormation registry */
  catalog?: ICatalogClient;
  /** Source of pass timestamps */
  clock?: () => Date;
}

/**
 * Everything one data directory needs, wired from configuration
 */
export interface Tracker {
  readonly config: TrackerConfig;
  readonly paths: TrackerPaths;
  readonly store: IDocumentStore;
  readonly ledger: IVersionLedger;
  /** Null when the history backend is `none` */
  readonly history: IHistoryLog | null;

  /**
   * Run one pass while holding the data-directory lock
   *
   * @throws {ConcurrentPassError} when another process is running a pass
   */
  sync(onProgress?: PassProgressListener): Promise<PassSummary>;
}

/**
 * Create a tracker and load its ledger
 *
 * @throws {LedgerLoadError} when an existing ledger file is invalid
 */
export async function createTracker(options: TrackerOptions): Promise<Tracker> {
  const { config } = options;
  const paths = resolveTrackerPaths(options.projectRoot, config);

  const store = createDocumentStore(paths.schemasDir);
  const ledger = await createVersionLedger(
    new FileLedgerStorage({ versionFile: paths.versionFile, removedFile: paths.removedFile }),
    { metadataPolicy: config.metadataPolicy }
  );
  const history = createHistoryLog(config.historyBackend, paths);

  let catalog = options.catalog;
  const clock = options.clock ?? (() => new Date());

  return {
    config,
    paths,
    store,
    ledger,
    history,

    async sync(onProgress?: PassProgressListener): Promise<PassSummary> {
      const lock = await acquireLock(paths.lockFile);
      if (!lock) {
        throw new ConcurrentPassError(paths.lockFile);
      }

      try {
        // Another process may have written the ledger since it was loaded
        await ledger.load();
        catalog ??= createCloudFormationCatalog({ region: config.region, typePrefix: config.typePrefix });

        const runner = createSnapshotRunner(
          { catalog, store, ledger, history },
          {
            concurrency: config.concurrency,
            fetchTimeoutMs: config.fetchTimeoutMs,
            progressInterval: config.progressInterval,
            clock,
          }
        );
        return await runner.run(onProgress);
      } finally {
        await lock.release();
        logger.debug({ dataDir: paths.dataDir }, "Pass lock released");
      }
    },
  };
}
