import { promises as fsp } from 'fs';
import os from 'os';
import path from 'path';
import { SessionController } from '../bot/session-controller';
import { Credentials } from '../credentials';
import { DownloadReconciler } from '../downloads/download-reconciler';
import { RunReporter } from '../reporting/run-reporter';
import { parseBotConfig } from '../schemas';
import type { BotConfigInput } from '../schemas';
import type { OutcomeCode } from '../types';
import type { WorkflowDependencies } from '../workflows/workflow-types';
import type { FakePortal } from './fake-portal';
import {
  FAST_TIMING,
  PORTAL_URL,
  createPortalLauncher,
  fakeProfileLock,
} from './portal-simulation';

export interface HarnessOptions {
  config?: BotConfigInput;
  /** Renders the section under test once the portal shell is up. */
  section?: (portal: FakePortal, downloadDirectory: string) => void;
  downloadTimeoutMs?: number;
}

export interface ProgressEntry {
  itemId: string;
  code: OutcomeCode;
  detail: string;
}

/**
 * Wires a real SessionController, RunReporter and DownloadReconciler to the
 * scripted portal, with downloads landing in a fresh temp directory.
 */
export async function createWorkflowHarness(options: HarnessOptions = {}) {
  const downloadDirectory = await fsp.mkdtemp(path.join(os.tmpdir(), 'portal-bot-wf-'));
  const botConfig = parseBotConfig({
    portalUrl: PORTAL_URL,
    loginRetryDelayMs: 0,
    profileDirectory: path.join(downloadDirectory, '.profile'),
    cacheDirectory: '',
    downloadDirectory,
    logoutOnFinish: false,
    supplier: '',
    ...options.config,
  });

  const progress: ProgressEntry[] = [];
  const messages: string[] = [];
  const reporter = new RunReporter({
    log: (message) => messages.push(message),
    progress: (itemId, code, detail) => progress.push({ itemId, code, detail }),
  });

  const portal = createPortalLauncher({
    onLoggedIn: (p) => options.section?.(p, downloadDirectory),
  });
  const session = new SessionController({
    credentials: new Credentials('test-user', 'test-secret'),
    botConfig,
    reporter,
    launcher: portal.launcher,
    lockProfile: fakeProfileLock().lockProfile,
    timing: FAST_TIMING,
  });
  const downloads = new DownloadReconciler({
    directory: downloadDirectory,
    reporter,
    timeoutMs: options.downloadTimeoutMs ?? 1000,
    pollIntervalMs: 20,
  });

  const deps: WorkflowDependencies = { session, botConfig, reporter, downloads };
  return {
    deps,
    portal,
    progress,
    messages,
    downloadDirectory,
    files: async () => (await fsp.readdir(downloadDirectory)).filter((name) => !name.startsWith('.')).sort(),
    cleanup: () => fsp.rm(downloadDirectory, { recursive: true, force: true }),
  };
}

/** Clicking `ref` drops `fileName` into the download directory, as the browser would. */
export function exportsFile(
  portal: FakePortal,
  ref: string,
  downloadDirectory: string,
  fileName: string,
  content: () => Buffer | string = () => 'xlsx',
): void {
  portal.onClick(ref, async () => {
    await fsp.writeFile(path.join(downloadDirectory, fileName), content());
  });
}
