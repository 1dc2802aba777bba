import { afterEach, describe, expect, test } from 'vitest';
import path from 'path';
import { OrderDetailsWorkflow } from './order-details';
import { createWorkItem } from '../types';
import type { OrderDetailsInput } from '../schemas';
import { button, element, input } from '../test-fixtures/elements';
import type { FakePortal } from '../test-fixtures/fake-portal';
import { createWorkflowHarness, exportsFile } from '../test-fixtures/workflow-harness';
import type { BotConfigInput } from '../schemas';

function orderSection(portal: FakePortal, downloadDirectory: string) {
  portal.addElements(
    button('menu-oda', 'Oda'),
    input('NumeroOdA'),
    input('NumeroContratto'),
    input('DataCreazioneA'),
    element({ ref: 'flag-service', tag: 'input', type: 'checkbox', name: 'GetItemServiceInfo' }),
    button('search', 'Cerca'),
    button('export', 'Esporta in Excel'),
  );
  portal.onClick('flag-service', (p) => {
    const flag = p.element('flag-service');
    if (flag) flag.attributes['aria-checked'] = 'true';
  });
  exportsFile(portal, 'export', downloadDirectory, 'Export.xlsx');
}

const order = (id: string, fields: OrderDetailsInput) =>
  createWorkItem<OrderDetailsInput>(id, fields);

describe('OrderDetailsWorkflow', () => {
  let cleanup: (() => Promise<void>) | null = null;

  afterEach(async () => {
    await cleanup?.();
    cleanup = null;
  });

  async function harness(config: BotConfigInput = {}) {
    const h = await createWorkflowHarness({ config, section: orderSection });
    cleanup = h.cleanup;
    return h;
  }

  test('names each export after the order and the contract', async () => {
    const h = await harness({ contractNumber: 'C77', dateTo: '28/02/2025' });
    const items = [
      order('row-1', { orderNumber: '8500123' }),
      order('row-2', { orderNumber: '' }),
      order('row-3', { orderNumber: '8500124', contractNumber: 'C99' }),
    ];

    const ok = await new OrderDetailsWorkflow(h.deps).execute(items);

    expect(ok).toBe(true);
    expect(items.map((item) => item.outcome?.detail)).toEqual([
      '8500123-C77.xlsx',
      'C77.xlsx',
      '8500124-C99.xlsx',
    ]);
    expect(items[1].outcome?.filePath).toBe(path.join(h.downloadDirectory, 'C77.xlsx'));
    expect(await h.files()).toEqual(['8500123-C77.xlsx', '8500124-C99.xlsx', 'C77.xlsx']);

    const portal = h.portal.current();
    expect(portal.valueOf('input-DataCreazioneA')).toBe('28.02.2025');
    expect(portal.valueOf('input-NumeroContratto')).toBe('C99');
    expect(portal.clicks().filter((ref) => ref === 'flag-service')).toHaveLength(1);
    expect(portal.clicks().slice(0, 3)).toEqual(['login-submit', 'menu-report', 'menu-oda']);
  });

  test('an item without order and contract is rejected', async () => {
    const h = await harness();
    const items = [order('row-1', { orderNumber: ' ' })];

    const ok = await new OrderDetailsWorkflow(h.deps).execute(items);

    expect(ok).toBe(false);
    expect(items[0].outcome).toEqual({
      code: 'missing-identifier',
      ok: false,
      detail: 'Numero OdA e numero contratto mancanti',
    });
  });

  test('an invalid end date fails setup before any navigation', async () => {
    const h = await harness({ dateTo: '31/02/2025' });
    const workflow = new OrderDetailsWorkflow(h.deps);

    const ok = await workflow.execute([order('row-1', { orderNumber: '8500123' })]);

    expect(ok).toBe(false);
    expect(h.deps.session.state).toBe('error');
    expect(workflow.lastError?.message).toBe(
      'Impossibile preparare la sezione del portale: data fine "31/02/2025" non valida',
    );
    expect(h.portal.current().clicks()).toEqual(['login-submit']);
  });
});
