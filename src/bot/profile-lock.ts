import { promises as fsp } from "fs";
import os from "os";
import path from "path";
import { logger } from "../logger";
import { FatalBotError } from "../errors";
import { FATAL_MESSAGES } from "../error-messages";
import { isMissingPath } from "./wait-primitives";

export const LOCK_FILE_NAME = ".portal-bot.lock";
export const CHROME_SINGLETON_LOCK = "SingletonLock";

export interface ProfileLock {
  readonly lockPath: string;
  release(): Promise<void>;
}

export interface ProfileLockOptions {
  pid?: number;
  isProcessAlive?: (pid: number) => boolean;
}

/** Profiles held by this process, by resolved path. */
const heldProfiles = new Set<string>();

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function readOwnerPid(lockPath: string): Promise<number | null> {
  try {
    const content = await fsp.readFile(lockPath, "utf8");
    const pid = parseInt(content.trim(), 10);
    return Number.isNaN(pid) ? null : pid;
  } catch (error) {
    if (isMissingPath(error)) return null;
    throw error;
  }
}

function lockedError(profileDirectory: string, owner: string): FatalBotError {
  return new FatalBotError(
    "profile-locked",
    `${FATAL_MESSAGES["profile-locked"]} (${profileDirectory}, ${owner})`,
  );
}

/**
 * Chrome writes SingletonLock as a symlink to "<hostname>-<pid>".
 * A link from this host whose pid is gone is stale and removed.
 */
async function checkChromeSingleton(
  profileDirectory: string,
  alive: (pid: number) => boolean,
): Promise<void> {
  const singletonPath = path.join(profileDirectory, CHROME_SINGLETON_LOCK);
  let target: string;
  try {
    target = await fsp.readlink(singletonPath);
  } catch (error) {
    if (isMissingPath(error)) return;
    if (!hasCode(error, "EINVAL")) throw error;
    // plain file: only removable when no browser holds it
    try {
      await fsp.unlink(singletonPath);
      return;
    } catch {
      throw lockedError(profileDirectory, CHROME_SINGLETON_LOCK);
    }
  }

  const separator = target.lastIndexOf("-");
  const host = target.slice(0, separator);
  const pid = parseInt(target.slice(separator + 1), 10);
  if (host === os.hostname() && !Number.isNaN(pid) && !alive(pid)) {
    logger.warn(`[ProfileLock] Removing stale Chrome lock (pid ${pid})`);
    await fsp.unlink(singletonPath);
    return;
  }
  throw lockedError(profileDirectory, `Chrome ${target}`);
}

/**
 * Takes the exclusive lock on a browser profile directory.
 * Fails fast with FatalBotError("profile-locked") when a live process holds it,
 * this one included.
 */
export async function acquireProfileLock(
  profileDirectory: string,
  options: ProfileLockOptions = {},
): Promise<ProfileLock> {
  const pid = options.pid ?? process.pid;
  const alive = options.isProcessAlive ?? isProcessAlive;
  const resolved = path.resolve(profileDirectory);
  const lockPath = path.join(resolved, LOCK_FILE_NAME);

  if (heldProfiles.has(resolved)) {
    throw lockedError(profileDirectory, `pid ${process.pid}`);
  }
  heldProfiles.add(resolved);

  try {
    await fsp.mkdir(resolved, { recursive: true });

    const owner = await readOwnerPid(lockPath);
    if (owner !== null && owner !== pid && alive(owner)) {
      throw lockedError(profileDirectory, `pid ${owner}`);
    }
    if (owner !== null) {
      logger.warn(`[ProfileLock] Removing stale lock (pid ${owner})`);
      await fsp.rm(lockPath, { force: true });
    }

    await checkChromeSingleton(resolved, alive);

    try {
      await fsp.writeFile(lockPath, String(pid), { flag: "wx" });
    } catch (error) {
      if (hasCode(error, "EEXIST")) {
        throw lockedError(profileDirectory, "acquired concurrently");
      }
      throw error;
    }
  } catch (error) {
    heldProfiles.delete(resolved);
    throw error;
  }
  logger.debug(`[ProfileLock] Acquired ${lockPath}`, { pid });

  let released = false;
  return {
    lockPath,
    async release(): Promise<void> {
      if (released) return;
      released = true;
      try {
        if ((await readOwnerPid(lockPath)) === pid) {
          await fsp.rm(lockPath, { force: true });
          logger.debug(`[ProfileLock] Released ${lockPath}`);
        }
      } finally {
        heldProfiles.delete(resolved);
      }
    },
  };
}
