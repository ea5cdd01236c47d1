/**
 * Git-backed history log
 *
 * The data directory is a git work tree; each pass that changed schemas
 * becomes one commit dated with the pass timestamp. Timelines are read back
 * with `git log` on the schema file, so the repository can be pushed and
 * inspected with ordinary git tooling.
 */

import { execFile } from "node:child_process";
import * as path from "node:path";
import { promisify } from "node:util";
import { BaseHistoryLog } from "./BaseHistoryLog.js";
import type { HistoryChange, HistoryEntry, NewHistoryEntry, TimelinePoint } from "../models/history-entry.js";
import { entityIdToFileName, fileNameToEntityId } from "../../document-store/models/entity-path.js";
import { ErrorCode, HistoryLogError, isSchemaLedgerError } from "../../errors.js";
import { ensureDirectory, fileExists } from "../../../utils/fs.js";
import { createLogger } from "../../../utils/logger.js";

const execFileAsync = promisify(execFile);
const logger = createLogger("git-history-log");

const RECORD_SEPARATOR = "\x1e";
const FIELD_SEPARATOR = "\x1f";

export interface GitHistoryLogOptions {
  /** Work tree root (the data directory) */
  repoPath: string;
  /** Directory holding the schema blobs, inside repoPath */
  schemasDir: string;
  authorName?: string;
  authorEmail?: string;
}

// =============================================================================
// Log Parsing
// =============================================================================

/**
 * Git prints `+00:00` offsets and whole seconds; the other backends use
 * `toISOString()`. Unparseable dates are passed through.
 */
export function normalizeGitDate(value: string): string {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? value : date.toISOString();
}

/**
 * Git's internal date format, accepted by GIT_AUTHOR_DATE and GIT_COMMITTER_DATE
 */
export function toGitDate(timestamp: string): string {
  return `@${Math.floor(new Date(timestamp).getTime() / 1000)} +0000`;
}

/**
 * Parse `git log --format=%H|%cI` output into timeline points
 */
export function parseGitLogLines(stdout: string): TimelinePoint[] {
  const points: TimelinePoint[] = [];
  for (const line of stdout.split("\n")) {
    const trimmed = line.trim();
    if (trimmed === "") continue;
    const separator = trimmed.indexOf("|");
    if (separator <= 0) continue;
    points.push({
      commitId: trimmed.slice(0, separator),
      timestamp: normalizeGitDate(trimmed.slice(separator + 1)),
    });
  }
  return points;
}

/**
 * Parse `git log --name-only` output written with {@link ENTRY_FORMAT}
 *
 * File names that do not decode to an entity id are ignored.
 */
export function parseGitLogEntries(stdout: string): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (const record of stdout.split(RECORD_SEPARATOR)) {
    const lines = record.split("\n");
    const header = lines[0]?.trim() ?? "";
    if (header === "") continue;

    const [commitId = "", parents = "", timestamp = "", ...subject] = header.split(FIELD_SEPARATOR);
    const changes: HistoryChange[] = [];
    for (const line of lines.slice(1)) {
      const name = path.posix.basename(line.trim());
      if (name === "") continue;
      const entityId = fileNameToEntityId(name);
      if (entityId !== null) changes.push({ entityId, path: name });
    }

    entries.push({
      commitId,
      parentId: parents.split(" ").find((parent) => parent !== "") ?? null,
      timestamp: normalizeGitDate(timestamp),
      message: subject.join(FIELD_SEPARATOR),
      changes,
    });
  }
  return entries;
}

const ENTRY_FORMAT = `--format=${RECORD_SEPARATOR}%H${FIELD_SEPARATOR}%P${FIELD_SEPARATOR}%cI${FIELD_SEPARATOR}%s`;

// =============================================================================
// Git History Log
// =============================================================================

export class GitHistoryLog extends BaseHistoryLog {
  readonly backend = "git" as const;
  private readonly schemasRelative: string;
  private initialized = false;

  constructor(private readonly options: GitHistoryLogOptions) {
    super();
    this.schemasRelative = path.relative(options.repoPath, options.schemasDir).split(path.sep).join("/") || ".";
  }

  async entries(): Promise<HistoryEntry[]> {
    if (!(await this.hasCommits())) return [];
    const stdout = await this.read(["log", "--reverse", "--name-only", ENTRY_FORMAT, "--", this.schemasRelative]);
    return parseGitLogEntries(stdout);
  }

  /**
   * Like the other backends, `key` matches as an entity id or as a blob name
   */
  override async queryHistory(key: string): Promise<TimelinePoint[]> {
    if (key === "" || !(await this.hasCommits())) return [];
    const names = new Set([entityIdToFileName(key)]);
    if (fileNameToEntityId(key) !== null) names.add(key);
    const stdout = await this.read([
      "log",
      "--reverse",
      "--format=%H|%cI",
      "--",
      ...[...names].map((name) => path.posix.join(this.schemasRelative, name)),
    ]);
    return parseGitLogLines(stdout);
  }

  async append(input: NewHistoryEntry): Promise<HistoryEntry> {
    try {
      await this.ensureRepository();
      await this.git(["add", "-A", "--", this.schemasRelative]);

      const commitArgs = ["commit", "--quiet", "-m", input.message];
      if (!(await this.hasStagedChanges())) {
        logger.warn({ timestamp: input.timestamp }, "No staged schema changes; recording an empty commit");
        commitArgs.push("--allow-empty");
      }
      const gitDate = toGitDate(input.timestamp);
      await this.git(commitArgs, {
        GIT_AUTHOR_DATE: gitDate,
        GIT_COMMITTER_DATE: gitDate,
      });

      const [hash = "", parents = "", committedAt = ""] = (await this.git(["log", "-1", "--format=%H|%P|%cI"]))
        .trim()
        .split("|");
      logger.info({ commit: hash.slice(0, 8), changes: input.changes.length }, "History commit created");
      return {
        commitId: hash,
        parentId: parents.split(" ").find((parent) => parent !== "") ?? null,
        timestamp: normalizeGitDate(committedAt),
        message: input.message,
        changes: input.changes,
      };
    } catch (error) {
      if (isSchemaLedgerError(error)) throw error;
      throw new HistoryLogError(
        `Failed to commit history in ${this.options.repoPath}`,
        ErrorCode.HISTORY_APPEND_FAILED,
        error
      );
    }
  }

  private async ensureRepository(): Promise<void> {
    if (this.initialized) return;
    await ensureDirectory(this.options.repoPath);
    if (!(await fileExists(path.join(this.options.repoPath, ".git")))) {
      await this.git(["init", "--quiet"]);
      logger.info({ repoPath: this.options.repoPath }, "Initialized history repository");
    }
    this.initialized = true;
  }

  private async hasCommits(): Promise<boolean> {
    if (!(await fileExists(path.join(this.options.repoPath, ".git")))) return false;
    try {
      await this.git(["rev-parse", "--verify", "--quiet", "HEAD"]);
      return true;
    } catch {
      // rev-parse exits non-zero on an unborn branch
      return false;
    }
  }

  private async hasStagedChanges(): Promise<boolean> {
    try {
      await this.git(["diff", "--cached", "--quiet"]);
      return false;
    } catch (error) {
      // exit code 1 means there are differences
      if (error instanceof Error && "code" in error && error.code === 1) return true;
      throw error;
    }
  }

  private async read(args: string[]): Promise<string> {
    try {
      return await this.git(args);
    } catch (error) {
      throw new HistoryLogError(
        `git ${args[0] ?? ""} failed in ${this.options.repoPath}`,
        ErrorCode.HISTORY_READ_FAILED,
        error
      );
    }
  }

  private async git(args: string[], env: Record<string, string> = {}): Promise<string> {
    const { stdout } = await execFileAsync("git", args, {
      cwd: this.options.repoPath,
      maxBuffer: 64 * 1024 * 1024,
      env: {
        ...process.env,
        GIT_AUTHOR_NAME: this.options.authorName ?? "cfn-schema-ledger",
        GIT_AUTHOR_EMAIL: this.options.authorEmail ?? "cfn-schema-ledger@localhost",
        GIT_COMMITTER_NAME: this.options.authorName ?? "cfn-schema-ledger",
        GIT_COMMITTER_EMAIL: this.options.authorEmail ?? "cfn-schema-ledger@localhost",
        ...env,
      },
    });
    return stdout;
  }
}
