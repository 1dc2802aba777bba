import { afterEach, describe, expect, test } from 'vitest';
import { TimesheetUploadWorkflow } from './timesheet-upload';
import { createWorkItem } from '../types';
import type { TimesheetUploadInput } from '../schemas';
import { button, element, input } from '../test-fixtures/elements';
import type { FakePortal } from '../test-fixtures/fake-portal';
import { createWorkflowHarness } from '../test-fixtures/workflow-harness';

// Tax codes with a valid check character
const ONE_MATCH = 'RSSMRA85T10A562S';
const NO_MATCH = 'BNCLRA90A41F205I';
const TWO_MATCHES = 'VRDGPP70C15H501K';

const WORKER_ROWS: Record<string, number> = { [ONE_MATCH]: 1, [TWO_MATCHES]: 2 };

const FORM_REFS = [
  'input-DataPrestazione',
  'input-OraIngresso',
  'input-OraUscita',
  'input-CodiceFiscale',
  'input-attachment',
  'search-worker',
  'confirm',
  'row-1',
  'row-2',
];

function uploadSection(portal: FakePortal, options: { confirms?: boolean } = {}) {
  const { confirms = true } = options;
  portal.addElements(
    button('menu-timesheet', 'Timesheet'),
    button('menu-management', 'Gestione Timesheet'),
    input('NumeroOdA'),
    button('extract', 'Estrai OdA'),
  );

  portal.onClick('extract', (p) => {
    p.removeElements(...FORM_REFS);
    if (p.valueOf('input-NumeroOdA') === 'UNKNOWN') {
      p.addElements(
        element({ ref: 'not-found', text: 'OdA non trovata' }),
        button('popup-close', 'Chiudi'),
      );
      return;
    }
    p.addElements(
      input('DataPrestazione'),
      input('OraIngresso'),
      input('OraUscita'),
      input('CodiceFiscale'),
      input('attachment', { type: 'file' }),
      button('search-worker', 'Cerca Risorsa'),
      button('confirm', 'Conferma'),
    );
  });
  portal.onClick('popup-close', (p) => p.removeElements('not-found', 'popup-close'));

  portal.onClick('search-worker', (p) => {
    p.removeElements('row-1', 'row-2');
    const taxCode = p.valueOf('input-CodiceFiscale') ?? '';
    for (let n = 1; n <= (WORKER_ROWS[taxCode] ?? 0); n++) {
      p.addElements(
        element({ ref: `row-${n}`, tag: 'tr', classes: ['x-grid-item'], text: `Risorsa ${n} ${taxCode}` }),
      );
    }
  });

  portal.onClick('confirm', (p) => {
    if (!confirms) return;
    p.addElements(
      element({ ref: 'saved', text: 'Salvataggio effettuato' }),
      button('saved-ok', 'OK'),
    );
  });
  portal.onClick('saved-ok', (p) => p.removeElements('saved', 'saved-ok'));
}

const workDay = (
  id: string,
  overrides: Partial<TimesheetUploadInput> = {},
) =>
  createWorkItem<TimesheetUploadInput>(id, {
    orderNumber: '8500123',
    taxCode: ONE_MATCH,
    workDate: '03/02/2025',
    entryTime: '08:00',
    exitTime: '17:00',
    ...overrides,
  });

describe('TimesheetUploadWorkflow', () => {
  let cleanup: (() => Promise<void>) | null = null;

  afterEach(async () => {
    await cleanup?.();
    cleanup = null;
  });

  async function harness(options: { confirms?: boolean } = {}) {
    const h = await createWorkflowHarness({
      section: (portal) => uploadSection(portal, options),
    });
    cleanup = h.cleanup;
    return h;
  }

  test('confirms a worker day on the extracted order', async () => {
    const h = await harness();
    const items = [workDay('row-1', { attachmentPath: '/tmp/ts-8500123.pdf' })];

    const ok = await new TimesheetUploadWorkflow(h.deps).execute(items);

    expect(ok).toBe(true);
    expect(items[0].status).toBe('completed');
    expect(items[0].outcome).toEqual({
      code: 'confirmed',
      ok: true,
      detail: `${ONE_MATCH} 03.02.2025`,
    });

    const portal = h.portal.current();
    expect(portal.clicks()).toEqual([
      'login-submit',
      'menu-timesheet',
      'menu-management',
      'extract',
      'search-worker',
      'row-1',
      'confirm',
      'saved-ok',
    ]);
    expect(portal.interactions).toContainEqual({
      type: 'upload',
      ref: 'input-attachment',
      filePath: '/tmp/ts-8500123.pdf',
    });
    expect(portal.valueOf('input-NumeroOdA')).toBe('8500123');
    expect(portal.valueOf('input-DataPrestazione')).toBe('03.02.2025');
    expect(portal.valueOf('input-OraIngresso')).toBe('08:00');
    expect(portal.valueOf('input-OraUscita')).toBe('17:00');
    expect(portal.valueOf('input-CodiceFiscale')).toBe(ONE_MATCH);
  });

  test('branches on the number of matching workers and reuses the extracted order', async () => {
    const h = await harness();
    const items = [
      workDay('row-1'),
      workDay('row-2', { taxCode: NO_MATCH }),
      workDay('row-3', { taxCode: TWO_MATCHES }),
      workDay('row-4', { orderNumber: 'UNKNOWN' }),
      workDay('row-5', { workDate: '04/02/2025' }),
    ];

    const ok = await new TimesheetUploadWorkflow(h.deps).execute(items);

    expect(ok).toBe(false);
    expect(items.map((item) => item.outcome)).toEqual([
      { code: 'confirmed', ok: true, detail: `${ONE_MATCH} 03.02.2025` },
      {
        code: 'no-match',
        ok: false,
        detail: `Nessuna risorsa con codice fiscale ${NO_MATCH}`,
      },
      {
        code: 'ambiguous-match',
        ok: false,
        detail: `2 risorse con codice fiscale ${TWO_MATCHES}`,
      },
      { code: 'identifier-not-found', ok: false, detail: 'OdA UNKNOWN non trovata' },
      { code: 'confirmed', ok: true, detail: `${ONE_MATCH} 04.02.2025` },
    ]);

    const clicks = h.portal.current().clicks();
    // 8500123 once, UNKNOWN, then 8500123 again after the failed lookup
    expect(clicks.filter((ref) => ref === 'extract')).toHaveLength(3);
    expect(clicks).toContain('popup-close');
    expect(clicks.filter((ref) => ref.startsWith('row-'))).toEqual(['row-1', 'row-1']);
    expect(items.map((item) => item.status)).toEqual([
      'completed',
      'failed',
      'failed',
      'failed',
      'completed',
    ]);
  });

  test('rejects items with missing or malformed fields before touching the form', async () => {
    const h = await harness();
    const items = [
      workDay('row-1', { taxCode: ' ' }),
      workDay('row-2', { taxCode: 'RSSMRA85T10A562X' }),
      workDay('row-3', { workDate: '31/02/2025' }),
    ];

    const ok = await new TimesheetUploadWorkflow(h.deps).execute(items);

    expect(ok).toBe(false);
    expect(items.map((item) => [item.outcome?.code, item.outcome?.detail])).toEqual([
      ['missing-identifier', 'Codice Fiscale mancante'],
      ['invalid-input', 'taxCode: Checksum Codice Fiscale non valido'],
      ['invalid-input', 'workDate: Data non esistente'],
    ]);
    expect(h.portal.current().clicks()).toEqual([
      'login-submit',
      'menu-timesheet',
      'menu-management',
    ]);
  });

  test('fails the item when the portal does not acknowledge the entry', async () => {
    const h = await harness({ confirms: false });
    const items = [workDay('row-1')];

    const ok = await new TimesheetUploadWorkflow(h.deps).execute(items);

    expect(ok).toBe(false);
    expect(items[0].outcome).toEqual({
      code: 'confirmation-failed',
      ok: false,
      detail: 'Messaggio di conferma non ricevuto',
    });
    expect(h.deps.session.state).toBe('completed');
  });
});
