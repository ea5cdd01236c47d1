/**
 * Lock Manager for the data directory
 *
 * A pass holds `<dataDir>/.sync.lock` for its whole duration. The file is
 * created exclusively and holds the owner's PID, so a lock left behind by a
 * crashed process can be detected and taken over.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createLogger } from "./logger.js";
import { ensureDirectory, isNotFoundError, readFileIfExists } from "./fs.js";

const logger = createLogger("lock-manager");

/**
 * Result of checking a lock file
 */
export interface LockCheckResult {
  /** Whether a lock file exists */
  exists: boolean;
  /** Whether the lock is stale (owning process is dead or unknown) */
  isStale: boolean;
  /** PID recorded in the lock file (if any) */
  ownerPid?: number;
  /** Path to the lock file */
  lockPath: string;
}

/**
 * A held lock; call `release` exactly once
 */
export interface LockHandle {
  lockPath: string;
  release(): Promise<void>;
}

/**
 * Checks if a process with given PID is running
 */
function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

/**
 * Checks the status of a lock file
 */
export async function checkLock(lockPath: string): Promise<LockCheckResult> {
  const content = await readFileIfExists(lockPath);
  if (content === null) {
    return { exists: false, isStale: false, lockPath };
  }

  const ownerPid = Number.parseInt(content.toString("utf8").trim(), 10);
  if (Number.isNaN(ownerPid)) {
    // Lock file exists but names no process - definitely stale
    return { exists: true, isStale: true, lockPath };
  }

  return { exists: true, isStale: !isProcessRunning(ownerPid), ownerPid, lockPath };
}

async function createLockFile(lockPath: string): Promise<boolean> {
  try {
    await fs.writeFile(lockPath, `${process.pid}\n`, { flag: "wx" });
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") return false;
    throw error;
  }
}

/**
 * Acquire an exclusive lock. A stale lock is removed and taken over once.
 *
 * @returns the handle, or null when a running process holds the lock
 */
export async function acquireLock(lockPath: string): Promise<LockHandle | null> {
  await ensureDirectory(path.dirname(lockPath));

  if (!(await createLockFile(lockPath))) {
    const status = await checkLock(lockPath);
    if (status.exists && !status.isStale) {
      logger.warn({ lockPath, ownerPid: status.ownerPid }, "Lock is held by running process");
      return null;
    }
    logger.info({ lockPath, previousOwner: status.ownerPid }, "Removing stale lock file");
    await fs.rm(lockPath, { force: true });
    if (!(await createLockFile(lockPath))) return null;
  }

  logger.debug({ lockPath }, "Lock acquired");
  return {
    lockPath,
    release: async () => {
      try {
        await fs.unlink(lockPath);
        logger.debug({ lockPath }, "Lock released");
      } catch (error) {
        if (!isNotFoundError(error)) throw error;
      }
    },
  };
}
