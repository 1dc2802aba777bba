import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { promises as fsp } from 'fs';
import os from 'os';
import path from 'path';
import { startWorkflowRun } from './bot-runner';
import type { WorkflowRunOptions } from './bot-runner';
import { Credentials } from '../credentials';
import { createWorkItem } from '../types';
import type { TimesheetDownloadInput } from '../schemas';
import { button, element, input } from '../test-fixtures/elements';
import {
  FAST_TIMING,
  PORTAL_URL,
  createPortalLauncher,
  fakeProfileLock,
} from '../test-fixtures/portal-simulation';
import { exportsFile } from '../test-fixtures/workflow-harness';
import type { ProgressEntry } from '../test-fixtures/workflow-harness';

describe('startWorkflowRun', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'portal-bot-run-'));
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  function options(
    overrides: Partial<WorkflowRunOptions<'timesheet-download'>> = {},
  ): WorkflowRunOptions<'timesheet-download'> & { portal: ReturnType<typeof createPortalLauncher> } {
    const portal = createPortalLauncher({
      onLoggedIn: (p) => {
        p.addElements(
          button('menu-timesheet', 'Timesheet'),
          input('NumeroOda'),
          input('PosizioneOda'),
          button('search', 'Cerca'),
          element({ ref: 'export', classes: ['x-tool'] }),
        );
        exportsFile(p, 'export', dir, 'Export.xlsx');
      },
    });
    return {
      type: 'timesheet-download',
      items: [createWorkItem<TimesheetDownloadInput>('row-1', { orderNumber: '8500123' })],
      credentials: new Credentials('test-user', 'test-secret'),
      config: {
        portalUrl: PORTAL_URL,
        downloadDirectory: dir,
        profileDirectory: path.join(dir, '.profile'),
        loginRetryDelayMs: 0,
        logoutOnFinish: false,
        supplier: '',
      },
      session: {
        launcher: portal.launcher,
        lockProfile: fakeProfileLock().lockProfile,
        timing: FAST_TIMING,
      },
      downloadTimeoutMs: 1000,
      portal,
      ...overrides,
    };
  }

  test('runs the workflow in the background and resolves with the result', async () => {
    const progress: ProgressEntry[] = [];
    const opts = options({
      sinks: { progress: (itemId, code, detail) => progress.push({ itemId, code, detail }) },
    });

    const handle = startWorkflowRun(opts);
    const result = await handle.done;

    expect(handle.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(result).toEqual({
      runId: handle.runId,
      ok: true,
      state: 'completed',
      summary: { processed: 1, succeeded: 1, failed: 0, byCode: { success: 1 } },
      error: null,
    });
    expect(handle.state()).toBe('completed');
    expect(progress).toEqual([{ itemId: 'row-1', code: 'success', detail: '8500123.xlsx' }]);
    expect(opts.items[0].status).toBe('completed');
  });

  test('a stop requested right after the start ends the run as stopped', async () => {
    const opts = options();

    const handle = startWorkflowRun(opts);
    handle.requestStop();
    const result = await handle.done;

    expect(result.state).toBe('stopped');
    expect(result.ok).toBe(false);
    expect(result.error).toBeNull();
    expect(result.summary.processed).toBe(0);
    expect(opts.items[0].status).toBe('pending');
    expect(opts.portal.current().closed).toBe(true);
  });

  test('collision prompts are answered through the handle input channel', async () => {
    await fsp.writeFile(path.join(dir, '8500123.xlsx'), 'previous');
    const opts = options();
    opts.config = { ...opts.config, collisionMode: 'interactive' };
    const prompts: string[] = [];

    const handle = startWorkflowRun(opts);
    handle.input.onRequest((request) => {
      prompts.push(request.prompt);
      handle.input.respond(request.id, '8500123-bis');
    });
    const result = await handle.done;

    expect(result.ok).toBe(true);
    expect(prompts).toEqual([
      'Il file "8500123.xlsx" esiste già. Inserisci un nuovo nome, ' +
        'lo stesso nome per sovrascrivere, oppure lascia vuoto per saltare.',
    ]);
    expect(opts.items[0].outcome?.detail).toBe('8500123-bis.xlsx');
    expect(await fsp.readFile(path.join(dir, '8500123.xlsx'), 'utf8')).toBe('previous');
  });

  test.each([
    ['an empty reply', (id: string, handle: ReturnType<typeof startWorkflowRun>) => handle.input.respond(id, '')],
    ['a cancelled prompt', (id: string, handle: ReturnType<typeof startWorkflowRun>) => handle.input.cancel(id)],
  ])('%s skips the colliding download and the run moves on', async (_label, answer) => {
    await fsp.writeFile(path.join(dir, '8500123.xlsx'), 'previous');
    const progress: ProgressEntry[] = [];
    const opts = options({
      items: [
        createWorkItem<TimesheetDownloadInput>('row-1', { orderNumber: '8500123' }),
        createWorkItem<TimesheetDownloadInput>('row-2', { orderNumber: '8500124' }),
      ],
      sinks: { progress: (itemId, code, detail) => progress.push({ itemId, code, detail }) },
    });
    opts.config = { ...opts.config, collisionMode: 'interactive' };

    const handle = startWorkflowRun(opts);
    handle.input.onRequest((request) => answer(request.id, handle));
    const result = await handle.done;

    expect(result.ok).toBe(false);
    expect(result.state).toBe('completed');
    expect(progress).toEqual([
      { itemId: 'row-1', code: 'download-skipped', detail: 'Export.xlsx' },
      { itemId: 'row-2', code: 'success', detail: '8500124.xlsx' },
    ]);
    expect(opts.items.map((item) => item.status)).toEqual(['failed', 'completed']);
    expect((await fsp.readdir(dir)).filter((name) => !name.startsWith('.')).sort()).toEqual([
      '8500123.xlsx',
      '8500124.xlsx',
    ]);
    expect(await fsp.readFile(path.join(dir, '8500123.xlsx'), 'utf8')).toBe('previous');
  });

  test('incomplete credentials are refused before anything starts', () => {
    const opts = options({ credentials: new Credentials('test-user', '') });

    expect(() => startWorkflowRun(opts)).toThrow(
      'Credenziali del portale mancanti (PORTAL_USERNAME / PORTAL_PASSWORD)',
    );
    expect(opts.portal.portals).toHaveLength(0);
  });

  test('an invalid configuration throws synchronously', () => {
    const opts = options();
    opts.config = { ...opts.config, operationTimeoutSeconds: -1 };

    expect(() => startWorkflowRun(opts)).toThrow();
  });
});
