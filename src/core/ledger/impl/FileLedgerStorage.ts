/**
 * File Ledger Storage
 *
 * `version_metadata.json` and `removed_schemas.json`, written with sorted
 * keys so the files diff cleanly when they are themselves tracked in a
 * history log.
 */

import type { z } from "zod";
import type { ILedgerStorage } from "../interfaces/IVersionLedger.js";
import {
  RemovedFileSchema,
  VersionFileSchema,
  createEmptyLedgerState,
  removedToStored,
  storedToRemoved,
  storedToVersion,
  versionToStored,
  type LedgerState,
  type StoredRemovedRecord,
  type StoredVersionRecord,
} from "../models/version-record.js";
import { canonicalJson } from "../../document-store/models/canonical.js";
import { LedgerLoadError, LedgerPersistError } from "../../errors.js";
import { readFileIfExists, writeFilesAtomic } from "../../../utils/fs.js";
import { formatZodError, safeValidate } from "../../../utils/validation.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("ledger-storage");

export interface FileLedgerStoragePaths {
  versionFile: string;
  removedFile: string;
}

export class FileLedgerStorage implements ILedgerStorage {
  constructor(private readonly paths: FileLedgerStoragePaths) {}

  async load(): Promise<LedgerState> {
    const state = createEmptyLedgerState();

    const versions = await this.readFile(this.paths.versionFile, VersionFileSchema);
    for (const [id, stored] of Object.entries(versions ?? {})) {
      state.versions.set(id, storedToVersion(stored));
    }

    const removed = await this.readFile(this.paths.removedFile, RemovedFileSchema);
    for (const [id, history] of Object.entries(removed ?? {})) {
      state.removed.set(id, history.map(storedToRemoved));
    }

    return state;
  }

  async save(state: LedgerState): Promise<void> {
    const versions: Record<string, StoredVersionRecord> = {};
    for (const [id, record] of state.versions) {
      versions[id] = versionToStored(record);
    }

    const removed: Record<string, StoredRemovedRecord[]> = {};
    for (const [id, history] of state.removed) {
      removed[id] = history.map(removedToStored);
    }

    try {
      await writeFilesAtomic([
        { path: this.paths.versionFile, content: canonicalJson(versions) },
        { path: this.paths.removedFile, content: canonicalJson(removed) },
      ]);
    } catch (error) {
      throw new LedgerPersistError(error);
    }

    logger.debug(
      { versionFile: this.paths.versionFile, active: state.versions.size, removed: state.removed.size },
      "Ledger persisted"
    );
  }

  private async readFile<T>(
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T | null> {
    let content: Buffer | null;
    try {
      content = await readFileIfExists(filePath);
    } catch (error) {
      throw new LedgerLoadError(filePath, "unreadable", error);
    }
    if (content === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(content.toString("utf-8"));
    } catch (error) {
      throw new LedgerLoadError(filePath, "not valid JSON", error);
    }

    const result = safeValidate(schema, parsed);
    if (!result.success) {
      throw new LedgerLoadError(filePath, formatZodError(result.error).join("; "));
    }
    return result.data;
  }
}
