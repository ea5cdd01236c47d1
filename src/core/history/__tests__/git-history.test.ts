/**
 * Tests for the git-backed History Log, against a real repository in a temp directory
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execFile, execFileSync } from "node:child_process";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { promisify } from "node:util";
import { GitHistoryLog } from "../impl/GitHistoryLog.js";
import type { HistoryChange } from "../models/history-entry.js";

const execFileAsync = promisify(execFile);

const BUCKET = "AWS::S3::Bucket";
const QUEUE = "AWS::SQS::Queue";

const bucketChange: HistoryChange = { entityId: BUCKET, path: "AWS--S3--Bucket.json" };
const queueChange: HistoryChange = { entityId: QUEUE, path: "AWS--SQS--Queue.json" };

const DAY_1 = "2024-01-01T00:00:00.000Z";
const DAY_2 = "2024-01-02T00:00:00.000Z";

function gitAvailable(): boolean {
  try {
    execFileSync("git", ["--version"], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}

describe.skipIf(!gitAvailable())("GitHistoryLog", () => {
  let repoPath: string;
  let schemasDir: string;
  let log: GitHistoryLog;

  beforeEach(async () => {
    repoPath = await fs.mkdtemp(path.join(os.tmpdir(), "schema-git-"));
    schemasDir = path.join(repoPath, "schemas");
    log = new GitHistoryLog({ repoPath, schemasDir, authorName: "Test", authorEmail: "test@example.com" });
  });

  afterEach(async () => {
    await fs.rm(repoPath, { recursive: true, force: true });
  });

  async function writeSchema(name: string, content: string): Promise<void> {
    await fs.mkdir(schemasDir, { recursive: true });
    await fs.writeFile(path.join(schemasDir, name), content);
  }

  async function commitCount(): Promise<number> {
    const { stdout } = await execFileAsync("git", ["rev-list", "--count", "HEAD"], { cwd: repoPath });
    return Number(stdout.trim());
  }

  it("should answer like an empty log before the first commit", async () => {
    expect(await log.entries()).toEqual([]);
    expect(await log.head()).toBeNull();
    expect(await log.queryTimeline(BUCKET)).toEqual([]);
    expect(await log.count(BUCKET)).toBe(0);
  });

  it("should commit each pass and read timelines back from git log", async () => {
    await writeSchema("AWS--S3--Bucket.json", '{"v":1}\n');
    const first = await log.commitPass([bucketChange], new Date(DAY_1));

    await writeSchema("AWS--S3--Bucket.json", '{"v":2}\n');
    await writeSchema("AWS--SQS--Queue.json", "{}\n");
    const second = await log.commitPass([bucketChange, queueChange], new Date(DAY_2));

    expect(first?.commitId).toMatch(/^[0-9a-f]{40}$/);
    expect(first).toMatchObject({ parentId: null, timestamp: DAY_1, message: `Schema update: ${DAY_1}` });
    expect(second).toMatchObject({ parentId: first?.commitId, timestamp: DAY_2 });

    expect(await log.queryTimeline(BUCKET)).toEqual([DAY_1, DAY_2]);
    expect(await log.queryTimeline("AWS--S3--Bucket.json")).toEqual([DAY_1, DAY_2]);
    expect(await log.queryTimeline(QUEUE)).toEqual([DAY_2]);
    expect(await log.count(BUCKET)).toBe(2);
    expect(await log.firstSeen(QUEUE)).toBe(DAY_2);
    expect(await log.latest(BUCKET)).toBe(DAY_2);

    expect(await log.entries()).toEqual([
      {
        commitId: first?.commitId,
        parentId: null,
        timestamp: DAY_1,
        message: `Schema update: ${DAY_1}`,
        changes: [bucketChange],
      },
      {
        commitId: second?.commitId,
        parentId: first?.commitId,
        timestamp: DAY_2,
        message: `Schema update: ${DAY_2}`,
        changes: [bucketChange, queueChange],
      },
    ]);
  });

  it("should look up an id that ends in the document extension by its own file", async () => {
    const id = "Custom::Thing.json";
    await writeSchema("Custom--Thing.json.json", "{}\n");
    await log.commitPass([{ entityId: id, path: "Custom--Thing.json.json" }], new Date(DAY_1));

    expect(await log.queryTimeline(id)).toEqual([DAY_1]);
    expect(await log.queryTimeline("Custom--Thing.json.json")).toEqual([DAY_1]);
  });

  it("should add no commit for a pass without changes", async () => {
    await writeSchema("AWS--S3--Bucket.json", "{}\n");
    await log.commitPass([bucketChange], new Date(DAY_1));

    expect(await log.commitPass([], new Date(DAY_2))).toBeNull();
    expect(await commitCount()).toBe(1);
  });

  it("should record an empty commit when nothing is staged", async () => {
    await writeSchema("AWS--S3--Bucket.json", "{}\n");
    const first = await log.commitPass([bucketChange], new Date(DAY_1));

    const second = await log.commitPass([bucketChange], new Date(DAY_2));

    expect(second).toMatchObject({ parentId: first?.commitId, timestamp: DAY_2 });
    expect(await commitCount()).toBe(2);
    expect(await log.queryTimeline(BUCKET)).toEqual([DAY_1]);
  });
});
