/**
 * Version Ledger Module
 *
 * First-seen / last-updated records per resource type, plus the
 * append-only archive of removed types.
 *
 * @module
 */

// Models
export * from "./models/version-record.js";

// Interfaces
export * from "./interfaces/IVersionLedger.js";

// Implementation
export { VersionLedger } from "./impl/VersionLedger.js";
export { FileLedgerStorage, type FileLedgerStoragePaths } from "./impl/FileLedgerStorage.js";
export { InMemoryLedgerStorage } from "./impl/InMemoryLedgerStorage.js";

import {
  DEFAULT_VERSION_LEDGER_CONFIG,
  type ILedgerStorage,
  type IVersionLedger,
  type VersionLedgerConfig,
} from "./interfaces/IVersionLedger.js";
import { VersionLedger } from "./impl/VersionLedger.js";

/**
 * Create a ledger and load its durable state
 */
export async function createVersionLedger(
  storage: ILedgerStorage,
  config?: Partial<VersionLedgerConfig>
): Promise<IVersionLedger> {
  const ledger = new VersionLedger(storage, { ...DEFAULT_VERSION_LEDGER_CONFIG, ...config });
  await ledger.load();
  return ledger;
}
