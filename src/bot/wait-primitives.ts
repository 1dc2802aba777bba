import { promises as fsp } from "fs";
import path from "path";
import { logger } from "../logger";
import { OverlayTimeoutError, describeError } from "../errors";
import type { PageDriver } from "./page-driver";

export const CONDITION_POLL_INTERVAL_MS = 100;
export const DOWNLOAD_POLL_INTERVAL_MS = 500;
export const OVERLAY_TIMEOUT_MS = 45_000;
export const OVERLAY_SETTLE_MS = 300;
export const DOWNLOAD_TIMEOUT_MS = 25_000;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const SHORT_TIMEOUT_MS = 5_000;
export const PAGE_LOAD_TIMEOUT_MS = 15_000;

const PARTIAL_DOWNLOAD_EXTENSIONS = [".crdownload", ".tmp", ".part"];

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Polls `predicate` until it returns true or the timeout elapses.
 * Never throws: a throwing predicate counts as "not yet".
 */
export async function waitForCondition(
  predicate: () => boolean | Promise<boolean>,
  timeoutMs: number,
  options?: { intervalMs?: number; label?: string },
): Promise<boolean> {
  const { intervalMs = CONDITION_POLL_INTERVAL_MS, label = "condition" } =
    options || {};
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    try {
      if (await predicate()) return true;
    } catch (error) {
      logger.debug(`[Wait] ${label} check failed, retrying`, {
        error: describeError(error),
      });
    }
    if (Date.now() >= deadline) return false;
    await sleep(Math.min(intervalMs, Math.max(0, deadline - Date.now())));
  }
}

/** Polls `probe` until it yields a value; null on timeout. */
export async function pollFor<T>(
  probe: () => Promise<T | null>,
  timeoutMs: number,
  options?: { intervalMs?: number; label?: string },
): Promise<T | null> {
  let result: T | null = null;
  await waitForCondition(
    async () => {
      result = await probe();
      return result !== null;
    },
    timeoutMs,
    options,
  );
  return result;
}

export type OverlayPolicy = "soft" | "hard";

/**
 * Waits for the ExtJS loading mask to disappear, then settles briefly.
 * `soft` logs and returns false on timeout; `hard` throws OverlayTimeoutError.
 */
export async function waitForOverlayCleared(
  page: PageDriver,
  timeoutMs: number = OVERLAY_TIMEOUT_MS,
  options?: { policy?: OverlayPolicy; label?: string; settleMs?: number },
): Promise<boolean> {
  const {
    policy = "soft",
    label = "overlay",
    settleMs = OVERLAY_SETTLE_MS,
  } = options || {};

  const cleared = await waitForCondition(
    async () => !(await page.isOverlayVisible()),
    timeoutMs,
    { label: `overlay:${label}` },
  );

  if (!cleared) {
    if (policy === "hard") {
      throw new OverlayTimeoutError(label, timeoutMs);
    }
    logger.warn(`[Wait] Overlay still visible after ${timeoutMs}ms (${label})`);
    return false;
  }

  if (settleMs > 0) await sleep(settleMs);
  return true;
}

function isPartialDownload(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return PARTIAL_DOWNLOAD_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

export async function listFiles(
  directory: string,
  extension?: string,
): Promise<Set<string>> {
  let entries: string[];
  try {
    entries = await fsp.readdir(directory);
  } catch (error) {
    if (isMissingPath(error)) return new Set();
    throw error;
  }
  const wanted = extension ? normalizeExtension(extension) : null;
  return new Set(
    entries.filter(
      (name) =>
        !isPartialDownload(name) &&
        (wanted === null || name.toLowerCase().endsWith(wanted)),
    ),
  );
}

/**
 * Polls `directory` until a file absent from `before` appears.
 * Returns the absolute path of the newest such file by mtime, or null.
 */
export async function waitForNewFile(
  directory: string,
  before: ReadonlySet<string>,
  timeoutMs: number = DOWNLOAD_TIMEOUT_MS,
  options?: { extension?: string; intervalMs?: number },
): Promise<string | null> {
  const { extension, intervalMs = DOWNLOAD_POLL_INTERVAL_MS } = options || {};
  return pollFor(
    async () => {
      const current = await listFiles(directory, extension);
      const added = [...current].filter((name) => !before.has(name));
      return added.length ? newestFile(directory, added) : null;
    },
    timeoutMs,
    { intervalMs, label: "download" },
  );
}

async function newestFile(
  directory: string,
  names: string[],
): Promise<string | null> {
  let newest: { filePath: string; mtimeMs: number } | null = null;
  for (const name of names) {
    const filePath = path.join(directory, name);
    try {
      const stats = await fsp.stat(filePath);
      if (!stats.isFile()) continue;
      if (!newest || stats.mtimeMs > newest.mtimeMs) {
        newest = { filePath, mtimeMs: stats.mtimeMs };
      }
    } catch (error) {
      // renamed between readdir and stat
      if (!isMissingPath(error)) throw error;
    }
  }
  return newest ? newest.filePath : null;
}

export function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

export function isMissingPath(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
