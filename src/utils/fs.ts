/**
 * File System Utilities
 * Atomic writes, hashing and file discovery for the on-disk stores
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import fg from "fast-glob";
import { createLogger } from "./logger.js";

const logger = createLogger("fs");

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * True when an fs call failed because the path does not exist
 */
export function isNotFoundError(error: unknown): boolean {
  return isErrnoException(error) && error.code === "ENOENT";
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fsPromises.mkdir(dirPath, { recursive: true });
  } catch (error) {
    // Directory already exists
    if (!isErrnoException(error) || error.code !== "EEXIST") {
      throw error;
    }
  }
}

/**
 * Read a whole file, or null when it does not exist. Other errors propagate.
 */
export async function readFileIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await fsPromises.readFile(filePath);
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
}

/**
 * Write a file atomically (temp file in the same directory, then rename).
 *
 * Readers see either the old content or the new content, never a partial
 * file. On failure the temp file is removed and the original is untouched.
 */
export async function writeFileAtomic(filePath: string, content: string | Buffer): Promise<void> {
  await writeFilesAtomic([{ path: filePath, content }]);
}

/**
 * Write several files as one unit. Every temp file is fully written before
 * the first rename. When more than one file is written, each target is backed
 * up before it is replaced, and a failure part-way through restores the
 * targets already replaced, so a failed call leaves every target as it was.
 */
export async function writeFilesAtomic(
  files: ReadonlyArray<{ path: string; content: string | Buffer }>
): Promise<void> {
  const staged: Array<{ tempPath: string; target: string }> = [];
  try {
    for (const file of files) {
      const dir = path.dirname(file.path);
      await ensureDirectory(dir);
      const tempPath = siblingPath(file.path, "tmp");
      staged.push({ tempPath, target: file.path });
      await fsPromises.writeFile(tempPath, file.content);
    }
  } catch (error) {
    await removeAll(staged.map(({ tempPath }) => tempPath));
    throw error;
  }

  const only = staged.length === 1 ? staged[0] : undefined;
  if (only) {
    try {
      await fsPromises.rename(only.tempPath, only.target);
    } catch (error) {
      await removeAll([only.tempPath]);
      throw error;
    }
    return;
  }

  // backupPath is null for a target that did not exist before
  const replaced: Array<{ target: string; backupPath: string | null }> = [];
  const backups: string[] = [];
  try {
    for (const { tempPath, target } of staged) {
      const backupPath = siblingPath(target, "bak");
      backups.push(backupPath);
      let hadTarget = true;
      try {
        await fsPromises.copyFile(target, backupPath);
      } catch (error) {
        if (!isNotFoundError(error)) throw error;
        hadTarget = false;
      }
      await fsPromises.rename(tempPath, target);
      replaced.push({ target, backupPath: hadTarget ? backupPath : null });
    }
  } catch (error) {
    await restore(replaced);
    await removeAll([...staged.map(({ tempPath }) => tempPath), ...backups]);
    throw error;
  }
  await removeAll(backups);
}

function siblingPath(filePath: string, suffix: string): string {
  // Dot-prefixed so file discovery skips it
  return path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${crypto.randomBytes(6).toString("hex")}.${suffix}`
  );
}

/**
 * Put replaced targets back, newest first. A target that cannot be restored
 * is logged; the error that caused the rollback is the one rethrown.
 */
async function restore(replaced: ReadonlyArray<{ target: string; backupPath: string | null }>): Promise<void> {
  for (const { target, backupPath } of [...replaced].reverse()) {
    try {
      if (backupPath === null) {
        await fsPromises.rm(target, { force: true });
      } else {
        await fsPromises.rename(backupPath, target);
      }
    } catch (error) {
      logger.error({ err: error, target, backupPath }, "Failed to restore file after an interrupted write");
    }
  }
}

async function removeAll(paths: readonly string[]): Promise<void> {
  await Promise.allSettled(paths.map((filePath) => fsPromises.rm(filePath, { force: true })));
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * SHA-256 of string or binary content, hex encoded
 */
export function calculateContentHash(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/**
 * Find files matching glob patterns
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = false } = options;

  return fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore,
    dot: false, // temp files from writeFileAtomic start with a dot
  });
}
