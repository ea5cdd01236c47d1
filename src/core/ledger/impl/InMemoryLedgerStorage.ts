/**
 * In-memory ledger storage for tests and dry runs
 */

import type { ILedgerStorage } from "../interfaces/IVersionLedger.js";
import {
  cloneRemovedRecord,
  cloneVersionRecord,
  createEmptyLedgerState,
  type LedgerState,
} from "../models/version-record.js";

function copyState(source: LedgerState): LedgerState {
  const state = createEmptyLedgerState();
  for (const [id, record] of source.versions) state.versions.set(id, cloneVersionRecord(record));
  for (const [id, history] of source.removed) state.removed.set(id, history.map(cloneRemovedRecord));
  return state;
}

export class InMemoryLedgerStorage implements ILedgerStorage {
  private state: LedgerState = createEmptyLedgerState();
  /** Number of completed saves */
  saves = 0;

  async load(): Promise<LedgerState> {
    return copyState(this.state);
  }

  async save(state: LedgerState): Promise<void> {
    this.state = copyState(state);
    this.saves++;
  }
}
