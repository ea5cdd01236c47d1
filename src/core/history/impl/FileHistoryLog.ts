/**
 * JSON-lines history log
 *
 * One entry per line, appended with `fs.appendFile`. Entries are validated
 * on every read so a hand-edited or truncated file fails loudly.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { BaseHistoryLog } from "./BaseHistoryLog.js";
import {
  createHistoryEntry,
  HistoryEntrySchema,
  type HistoryEntry,
  type NewHistoryEntry,
} from "../models/history-entry.js";
import { ErrorCode, HistoryLogError, isSchemaLedgerError } from "../../errors.js";
import { ensureDirectory, readFileIfExists } from "../../../utils/fs.js";
import { formatZodError } from "../../../utils/validation.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("file-history-log");

export class FileHistoryLog extends BaseHistoryLog {
  readonly backend = "file" as const;

  constructor(private readonly filePath: string) {
    super();
  }

  get location(): string {
    return this.filePath;
  }

  async entries(): Promise<HistoryEntry[]> {
    let raw: Buffer | null;
    try {
      raw = await readFileIfExists(this.filePath);
    } catch (error) {
      throw new HistoryLogError(
        `Failed to read history log ${this.filePath}`,
        ErrorCode.HISTORY_READ_FAILED,
        error
      );
    }
    if (raw === null) return [];

    const entries: HistoryEntry[] = [];
    const lines = raw.toString("utf8").split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim() ?? "";
      if (line === "") continue;
      entries.push(this.parseLine(line, i + 1));
    }
    return entries;
  }

  async append(input: NewHistoryEntry): Promise<HistoryEntry> {
    try {
      const parent = await this.head();
      const entry = createHistoryEntry(input, parent?.commitId ?? null);
      await ensureDirectory(path.dirname(this.filePath));
      await fs.appendFile(this.filePath, `${JSON.stringify(entry)}\n`, "utf8");
      logger.debug({ commitId: entry.commitId, changes: entry.changes.length }, "History entry appended");
      return entry;
    } catch (error) {
      if (isSchemaLedgerError(error)) throw error;
      throw new HistoryLogError(
        `Failed to append to history log ${this.filePath}`,
        ErrorCode.HISTORY_APPEND_FAILED,
        error
      );
    }
  }

  private parseLine(line: string, lineNumber: number): HistoryEntry {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      throw new HistoryLogError(
        `Invalid JSON on line ${lineNumber} of ${this.filePath}`,
        ErrorCode.HISTORY_READ_FAILED,
        error
      );
    }
    const result = HistoryEntrySchema.safeParse(value);
    if (!result.success) {
      throw new HistoryLogError(
        `Invalid history entry on line ${lineNumber} of ${this.filePath}: ${formatZodError(result.error).join("; ")}`,
        ErrorCode.HISTORY_READ_FAILED
      );
    }
    return result.data;
  }
}
