import { promises as fsp } from "fs";
import path from "path";
import { logger } from "../logger";
import type { CollisionMode, DownloadRecord } from "../types";
import { RunReporter } from "../reporting/run-reporter";
import {
  DOWNLOAD_POLL_INTERVAL_MS,
  DOWNLOAD_TIMEOUT_MS,
  isMissingPath,
  listFiles,
  normalizeExtension,
  waitForNewFile,
} from "../bot/wait-primitives";

export interface DownloadReconcilerOptions {
  directory: string;
  extension?: string;
  collisionMode?: CollisionMode;
  reporter?: RunReporter;
  timeoutMs?: number;
  pollIntervalMs?: number;
  now?: () => Date;
}

export type TargetResolution =
  | { action: "write"; targetPath: string; overwrite: boolean }
  | { action: "skip"; reason: string };

const ILLEGAL_FILE_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

export function sanitizeBaseName(baseName: string): string {
  const cleaned = baseName
    .replace(ILLEGAL_FILE_CHARS, "_")
    .trim()
    .replace(/[. ]+$/, "");
  return cleaned || "download";
}

/** `YYYYMMDD-HHmmss` in local time */
export function formatCollisionTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Matches a triggered export to the file it produced in the download
 * directory, then gives it its canonical `<primary>[-<secondary>].<ext>` name.
 * Existing files are never overwritten unless the operator confirms it.
 */
export class DownloadReconciler {
  readonly directory: string;
  readonly extension: string;
  private readonly collisionMode: CollisionMode;
  private readonly reporter: RunReporter;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly now: () => Date;

  constructor(options: DownloadReconcilerOptions) {
    this.directory = path.resolve(options.directory);
    this.extension = normalizeExtension(options.extension ?? ".xlsx");
    this.collisionMode = options.collisionMode ?? "suffix";
    this.reporter = options.reporter ?? new RunReporter();
    this.timeoutMs = options.timeoutMs ?? DOWNLOAD_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DOWNLOAD_POLL_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
  }

  snapshot(): Promise<Set<string>> {
    return listFiles(this.directory, this.extension);
  }

  async triggerDownloadAndWait(
    action: () => Promise<unknown>,
    before: ReadonlySet<string>,
    timeoutMs: number = this.timeoutMs,
  ): Promise<DownloadRecord | null> {
    await action();
    const discoveredPath = await waitForNewFile(this.directory, before, timeoutMs, {
      extension: this.extension,
      intervalMs: this.pollIntervalMs,
    });
    if (!discoveredPath) {
      logger.warn(`[Download] No new ${this.extension} file after ${timeoutMs}ms`, {
        directory: this.directory,
      });
      return null;
    }
    logger.info(`[Download] Detected ${path.basename(discoveredPath)}`);
    return {
      discoveredPath,
      fileName: path.basename(discoveredPath),
      detectedAt: Date.now(),
    };
  }

  /**
   * Picks the destination for `baseName`. A name held by another file is
   * resolved with a timestamp suffix, or by asking the operator in
   * interactive mode.
   */
  async resolveTargetName(
    baseName: string,
    discoveredPath?: string,
  ): Promise<TargetResolution> {
    const base = this.stripExtension(sanitizeBaseName(baseName));
    const wanted = this.pathFor(base);
    if (!(await this.isTakenByOther(wanted, discoveredPath))) {
      return { action: "write", targetPath: wanted, overwrite: false };
    }

    if (this.collisionMode === "interactive") {
      return this.resolveInteractively(base, discoveredPath);
    }

    const stamp = formatCollisionTimestamp(this.now());
    for (let n = 1; ; n++) {
      const candidate = this.pathFor(`${base}-${stamp}_${n}`);
      if (!(await this.isTakenByOther(candidate, discoveredPath))) {
        logger.info(
          `[Download] ${path.basename(wanted)} exists, using ${path.basename(candidate)}`,
        );
        return { action: "write", targetPath: candidate, overwrite: false };
      }
    }
  }

  /** Moves the download to its destination, or deletes it on skip. */
  async finalize(
    record: DownloadRecord,
    resolution: TargetResolution,
  ): Promise<DownloadRecord | null> {
    if (resolution.action === "skip") {
      await this.discard(record.discoveredPath);
      this.reporter.log(`File ${record.fileName} scartato (${resolution.reason})`, "warn");
      return null;
    }

    const { targetPath } = resolution;
    if (path.resolve(record.discoveredPath) !== path.resolve(targetPath)) {
      await fsp.mkdir(path.dirname(targetPath), { recursive: true });
      await moveFile(record.discoveredPath, targetPath);
    }
    this.reporter.log(`✓ File salvato: ${path.basename(targetPath)}`);
    return { ...record, finalPath: targetPath };
  }

  async reconcile(
    record: DownloadRecord,
    baseName: string,
  ): Promise<DownloadRecord | null> {
    const resolution = await this.resolveTargetName(baseName, record.discoveredPath);
    return this.finalize(record, resolution);
  }

  async discard(filePath: string): Promise<void> {
    try {
      await fsp.unlink(filePath);
    } catch (error) {
      if (!isMissingPath(error)) throw error;
    }
  }

  private async resolveInteractively(
    initialBase: string,
    discoveredPath?: string,
  ): Promise<TargetResolution> {
    let base = initialBase;
    for (;;) {
      const taken = `${base}${this.extension}`;
      const reply = await this.reporter.requestInput(
        `Il file "${taken}" esiste già. Inserisci un nuovo nome, ` +
          `lo stesso nome per sovrascrivere, oppure lascia vuoto per saltare.`,
      );
      const trimmed = reply?.trim() ?? "";
      if (!trimmed) {
        return { action: "skip", reason: "nome non fornito" };
      }

      const next = this.stripExtension(sanitizeBaseName(trimmed));
      if (next === base) {
        return { action: "write", targetPath: this.pathFor(base), overwrite: true };
      }
      base = next;
      if (!(await this.isTakenByOther(this.pathFor(base), discoveredPath))) {
        return { action: "write", targetPath: this.pathFor(base), overwrite: false };
      }
    }
  }

  private pathFor(base: string): string {
    return path.join(this.directory, `${base}${this.extension}`);
  }

  private stripExtension(base: string): string {
    return base.toLowerCase().endsWith(this.extension)
      ? base.slice(0, -this.extension.length) || base
      : base;
  }

  private async isTakenByOther(
    filePath: string,
    discoveredPath?: string,
  ): Promise<boolean> {
    if (discoveredPath && path.resolve(discoveredPath) === path.resolve(filePath)) {
      return false;
    }
    try {
      await fsp.access(filePath);
      return true;
    } catch (error) {
      if (isMissingPath(error)) return false;
      throw error;
    }
  }
}

async function moveFile(source: string, target: string): Promise<void> {
  try {
    await fsp.rename(source, target);
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "EXDEV")) {
      throw error;
    }
    await fsp.copyFile(source, target);
    await fsp.unlink(source);
  }
}
