/**
 * Snapshot Module
 *
 * Runs one complete snapshot pass over the catalog.
 *
 * @module
 */

export * from "./interfaces/ISnapshotRunner.js";
export { SnapshotRunner, dedupeEntries, type SnapshotRunnerDependencies } from "./impl/SnapshotRunner.js";

import {
  DEFAULT_SNAPSHOT_RUNNER_CONFIG,
  type ISnapshotRunner,
  type SnapshotRunnerConfig,
} from "./interfaces/ISnapshotRunner.js";
import { SnapshotRunner, type SnapshotRunnerDependencies } from "./impl/SnapshotRunner.js";

export function createSnapshotRunner(
  deps: SnapshotRunnerDependencies,
  config?: Partial<SnapshotRunnerConfig>
): ISnapshotRunner {
  return new SnapshotRunner(deps, { ...DEFAULT_SNAPSHOT_RUNNER_CONFIG, ...config });
}
