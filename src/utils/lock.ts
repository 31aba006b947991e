/**
 * PID lock file: one running sorter per workspace
 */

import { unlinkSync } from "fs";
import { readFile, unlink, writeFile } from "fs/promises";
import type { Logger } from "pino";
import { errnoCode } from "./errors";
import { createLogger } from "./logger";

export interface LockManager {
  /** Attempt to acquire the lock */
  acquire(): Promise<boolean>;

  /** Release the lock if this process holds it */
  release(): Promise<void>;

  /** Check if the lock is held by a live process */
  isLocked(): Promise<boolean>;
}

function isAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(error) === "EPERM";
  }
}

async function readPid(lockFile: string): Promise<number | null> {
  try {
    return Number.parseInt(await readFile(lockFile, "utf-8"), 10);
  } catch (error: unknown) {
    if (errnoCode(error) === "ENOENT") return null;
    throw error;
  }
}

/**
 * Create a lock manager for a given lock file path
 */
export function createLockManager(
  lockFile: string,
  log: Logger = createLogger("lock")
): LockManager {
  return {
    async acquire(): Promise<boolean> {
      try {
        await writeFile(lockFile, process.pid.toString(), { flag: "wx" });
        log.debug({ pid: process.pid, lockFile }, "Lock acquired");
        return true;
      } catch (error: unknown) {
        if (errnoCode(error) !== "EEXIST") {
          log.error({ error: errnoCode(error) ?? String(error), lockFile }, "Failed to acquire lock");
          return false;
        }
      }

      const holder = await readPid(lockFile);
      if (holder !== null && holder !== process.pid && isAlive(holder)) {
        log.warn({ pid: holder }, "Another instance is sorting this workspace");
        return false;
      }
      if (holder === process.pid) {
        return true;
      }

      log.info({ stalePid: holder }, "Stale lock found, taking over");
      await writeFile(lockFile, process.pid.toString());
      return true;
    },

    async release(): Promise<void> {
      const holder = await readPid(lockFile).catch(() => null);
      if (holder !== process.pid) return;

      await unlink(lockFile).catch((error: unknown) => {
        if (errnoCode(error) !== "ENOENT") throw error;
      });
      log.debug({ lockFile }, "Lock released");
    },

    async isLocked(): Promise<boolean> {
      const holder = await readPid(lockFile).catch(() => null);
      return holder !== null && isAlive(holder);
    },
  };
}

/**
 * Remove the lock file when the process exits, however it exits
 */
export function releaseLockOnExit(lockFile: string): void {
  process.on("exit", () => {
    try {
      unlinkSync(lockFile);
    } catch {
      // Already gone
    }
  });
}
