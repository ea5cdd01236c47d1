/**
 * Tests for the History Log
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { InMemoryHistoryLog } from "../impl/InMemoryHistoryLog.js";
import { FileHistoryLog } from "../impl/FileHistoryLog.js";
import { normalizeGitDate, parseGitLogEntries, parseGitLogLines, toGitDate } from "../impl/GitHistoryLog.js";
import { computeCommitId, type HistoryChange } from "../models/history-entry.js";
import type { IHistoryLog } from "../interfaces/IHistoryLog.js";
import { createHistoryLog, deriveVersionSummary } from "../index.js";
import { ErrorCode, HistoryLogError } from "../../errors.js";

const BUCKET = "AWS::S3::Bucket";
const QUEUE = "AWS::SQS::Queue";

const bucketChange: HistoryChange = { entityId: BUCKET, path: "AWS--S3--Bucket.json", contentHash: "hash-bucket" };
const queueChange: HistoryChange = { entityId: QUEUE, path: "AWS--SQS--Queue.json", contentHash: "hash-queue" };

function day(n: number): Date {
  return new Date(Date.UTC(2024, 0, n));
}

// =============================================================================
// Shared Behaviour
// =============================================================================

const backends: Array<[string, () => Promise<{ log: IHistoryLog; cleanup: () => Promise<void> }>]> = [
  ["InMemoryHistoryLog", async () => ({ log: new InMemoryHistoryLog(), cleanup: async () => {} })],
  [
    "FileHistoryLog",
    async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), "schema-history-"));
      return {
        log: new FileHistoryLog(path.join(dir, "history.jsonl")),
        cleanup: () => fs.rm(dir, { recursive: true, force: true }),
      };
    },
  ],
];

describe.each(backends)("%s", (_name, setup) => {
  let log: IHistoryLog;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ log, cleanup } = await setup());
  });

  afterEach(async () => {
    await cleanup();
  });

  it("should append nothing for a pass without changes", async () => {
    expect(await log.commitPass([], day(1))).toBeNull();
    expect(await log.entries()).toEqual([]);
    expect(await log.head()).toBeNull();
  });

  it("should build content-addressed entries chained to the previous head", async () => {
    const first = await log.commitPass([bucketChange], day(1));
    const second = await log.commitPass([queueChange], day(2));

    expect(first).toEqual({
      commitId: computeCommitId({
        parentId: null,
        timestamp: "2024-01-01T00:00:00.000Z",
        message: "Schema update: 2024-01-01T00:00:00.000Z",
        changes: [bucketChange],
      }),
      parentId: null,
      timestamp: "2024-01-01T00:00:00.000Z",
      message: "Schema update: 2024-01-01T00:00:00.000Z",
      changes: [bucketChange],
    });
    expect(second?.parentId).toBe(first?.commitId);
    expect(await log.entries()).toEqual([first, second]);
    expect(await log.head()).toEqual(second);
  });

  it("should sort changes by path", async () => {
    const entry = await log.commitPass([queueChange, bucketChange], day(1));

    expect(entry?.changes.map((change) => change.path)).toEqual(["AWS--S3--Bucket.json", "AWS--SQS--Queue.json"]);
  });

  it("should derive per-entity timelines by id or blob name", async () => {
    await log.commitPass([bucketChange], day(1));
    await log.commitPass([queueChange], day(2));
    await log.commitPass([bucketChange, queueChange], day(3));

    const expected = ["2024-01-01T00:00:00.000Z", "2024-01-03T00:00:00.000Z"];
    expect(await log.queryTimeline(BUCKET)).toEqual(expected);
    expect(await log.queryTimeline("AWS--S3--Bucket.json")).toEqual(expected);
    expect(await log.count(BUCKET)).toBe(2);
    expect(await log.firstSeen(BUCKET)).toBe("2024-01-01T00:00:00.000Z");
    expect(await log.latest(BUCKET)).toBe("2024-01-03T00:00:00.000Z");
  });

  it("should collapse entries sharing a timestamp", async () => {
    await log.append({ timestamp: "2024-01-01T00:00:00.000Z", message: "first", changes: [bucketChange] });
    await log.append({ timestamp: "2024-01-01T00:00:00.000Z", message: "second", changes: [bucketChange] });

    expect(await log.queryHistory(BUCKET)).toHaveLength(2);
    expect(await log.queryTimeline(BUCKET)).toEqual(["2024-01-01T00:00:00.000Z"]);
    expect(await log.count(BUCKET)).toBe(1);
  });

  it("should answer sentinels for unknown entities", async () => {
    await log.commitPass([bucketChange], day(1));

    expect(await log.queryTimeline("AWS::Nope::Nope")).toEqual([]);
    expect(await log.count("AWS::Nope::Nope")).toBe(0);
    expect(await log.latest("AWS::Nope::Nope")).toBeNull();
    expect(await log.firstSeen("AWS::Nope::Nope")).toBeNull();
  });
});

// =============================================================================
// File Backend
// =============================================================================

describe("FileHistoryLog persistence", () => {
  let tempDir: string;
  let historyFile: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "schema-history-"));
    historyFile = path.join(tempDir, "nested", "history.jsonl");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should read entries written by another instance", async () => {
    const writer = new FileHistoryLog(historyFile);
    const first = await writer.commitPass([bucketChange], day(1));
    const second = await writer.commitPass([queueChange], day(2));

    const reader = new FileHistoryLog(historyFile);

    expect(await reader.entries()).toEqual([first, second]);
    expect((await fs.readFile(historyFile, "utf-8")).split("\n")).toHaveLength(3);
  });

  it("should reject a line that is not JSON", async () => {
    const log = new FileHistoryLog(historyFile);
    await log.commitPass([bucketChange], day(1));
    await fs.appendFile(historyFile, "{oops\n");

    const error = await log.entries().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HistoryLogError);
    expect(error).toMatchObject({
      code: ErrorCode.HISTORY_READ_FAILED,
      message: `Invalid JSON on line 2 of ${historyFile}`,
    });
  });

  it("should reject a line that is not a history entry", async () => {
    await fs.mkdir(path.dirname(historyFile), { recursive: true });
    await fs.writeFile(historyFile, `${JSON.stringify({ commitId: "x" })}\n`);

    await expect(new FileHistoryLog(historyFile).entries()).rejects.toMatchObject({
      code: ErrorCode.HISTORY_READ_FAILED,
    });
  });
});

// =============================================================================
// Version Summary
// =============================================================================

describe("deriveVersionSummary", () => {
  it("should report the newest points first, limited", async () => {
    const log = new InMemoryHistoryLog();
    const commits: string[] = [];
    for (let n = 1; n <= 7; n++) {
      const entry = await log.commitPass([bucketChange], day(n));
      commits.push(entry?.commitId ?? "");
    }

    const summary = await deriveVersionSummary(log, BUCKET);

    expect(summary.totalUpdates).toBe(7);
    expect(summary.firstSeen).toBe("2024-01-01T00:00:00.000Z");
    expect(summary.latestUpdate).toBe("2024-01-07T00:00:00.000Z");
    expect(summary.history).toEqual(
      [7, 6, 5, 4, 3].map((n) => ({
        commit: (commits[n - 1] ?? "").slice(0, 8),
        timestamp: day(n).toISOString(),
      }))
    );
  });

  it("should report an empty summary for an unknown entity", async () => {
    expect(await deriveVersionSummary(new InMemoryHistoryLog(), BUCKET)).toEqual({
      latestUpdate: null,
      firstSeen: null,
      totalUpdates: 0,
      history: [],
    });
  });
});

describe("createHistoryLog", () => {
  const paths = { dataDir: "/data", schemasDir: "/data/schemas", historyFile: "/data/history.jsonl" };

  it("should pick the configured backend", () => {
    expect(createHistoryLog("none", paths)).toBeNull();
    expect(createHistoryLog("file", paths)?.backend).toBe("file");
    expect(createHistoryLog("git", paths)?.backend).toBe("git");
  });
});

// =============================================================================
// Git Log Parsing
// =============================================================================

describe("git dates", () => {
  it("should normalize git offsets to the timestamps the other backends write", () => {
    expect(normalizeGitDate("2024-01-01T02:00:00+02:00")).toBe("2024-01-01T00:00:00.000Z");
    expect(normalizeGitDate("not a date")).toBe("not a date");
  });

  it("should format pass timestamps in git's internal date format", () => {
    expect(toGitDate("2024-01-01T00:00:00.000Z")).toBe("@1704067200 +0000");
    expect(toGitDate("2024-01-01T00:00:00.900Z")).toBe("@1704067200 +0000");
  });
});

describe("parseGitLogLines", () => {
  it("should parse hash and date pairs and skip blank lines", () => {
    expect(parseGitLogLines("abc123|2024-01-01T00:00:00+00:00\n\ndef456|2024-02-01T00:00:00+00:00\n")).toEqual([
      { commitId: "abc123", timestamp: "2024-01-01T00:00:00.000Z" },
      { commitId: "def456", timestamp: "2024-02-01T00:00:00.000Z" },
    ]);
  });

  it("should return nothing for empty output", () => {
    expect(parseGitLogLines("")).toEqual([]);
  });
});

describe("parseGitLogEntries", () => {
  it("should recover entries and changed schema files", () => {
    const stdout = [
      "\x1eaaa\x1f\x1f2024-01-01T00:00:00+00:00\x1fSchema update: 2024-01-01T00:00:00.000Z",
      "",
      "schemas/AWS--S3--Bucket.json",
      "schemas/notes.txt",
      "\x1ebbb\x1faaa\x1f2024-02-01T00:00:00+00:00\x1fSchema update: 2024-02-01T00:00:00.000Z",
      "",
      "schemas/AWS--SQS--Queue.json",
      "",
    ].join("\n");

    expect(parseGitLogEntries(stdout)).toEqual([
      {
        commitId: "aaa",
        parentId: null,
        timestamp: "2024-01-01T00:00:00.000Z",
        message: "Schema update: 2024-01-01T00:00:00.000Z",
        changes: [{ entityId: BUCKET, path: "AWS--S3--Bucket.json" }],
      },
      {
        commitId: "bbb",
        parentId: "aaa",
        timestamp: "2024-02-01T00:00:00.000Z",
        message: "Schema update: 2024-02-01T00:00:00.000Z",
        changes: [{ entityId: QUEUE, path: "AWS--SQS--Queue.json" }],
      },
    ]);
  });
});
