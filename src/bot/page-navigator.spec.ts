import { describe, expect, test, beforeEach } from 'vitest';
import { PageNavigator } from './page-navigator';
import { byName, byText, chain } from './locators';
import { ItemFailure } from '../errors';
import { FakePortal } from '../test-fixtures/fake-portal';
import { button, element, input } from '../test-fixtures/elements';

const REPORT = chain('Report', byText('Report'));
const TIMESHEET = chain('Timesheet', byText('Timesheet', { tags: ['span'] }));

describe('PageNavigator', () => {
  let portal: FakePortal;
  let navigator: PageNavigator;

  beforeEach(() => {
    portal = new FakePortal();
    navigator = new PageNavigator(portal, { stepTimeoutMs: 100, overlayTimeoutMs: 100 });
  });

  describe('navigateMenuPath', () => {
    test('clicks each step once it appears', async () => {
      portal.setElements([button('report', 'Report')]);
      portal.onClick('report', (p) => p.addElements(button('timesheet', 'Timesheet')));

      const result = await navigator.navigateMenuPath([REPORT, TIMESHEET]);

      expect(result).toEqual({ ok: true, completedSteps: 2 });
      expect(portal.clicks()).toEqual(['report', 'timesheet']);
    });

    test('reports the step that could not be resolved', async () => {
      portal.setElements([button('report', 'Report')]);

      const result = await navigator.navigateMenuPath([REPORT, TIMESHEET]);

      expect(result).toEqual({ ok: false, failedStep: 'Timesheet', completedSteps: 1 });
    });
  });

  describe('fillField', () => {
    test('assigns the value to the resolved input', async () => {
      portal.setElements([input('NumeroOda')]);

      await navigator.fillField(chain('order', byName('NumeroOda')), '8500123');

      expect(portal.valueOf('input-NumeroOda')).toBe('8500123');
    });

    test('raises field-not-found when no strategy resolves', async () => {
      portal.setElements([input('Altro')]);

      const error = await navigator
        .fillField(chain('order', byName('NumeroOda')), '8500123')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ItemFailure);
      expect(error instanceof ItemFailure && error.code).toBe('field-not-found');
    });

    test('raises field-not-fillable for a read-only input', async () => {
      portal.setElements([input('NumeroOda', { readOnly: true })]);

      const error = await navigator
        .fillField(chain('order', byName('NumeroOda')), '8500123')
        .catch((e: unknown) => e);

      expect(error instanceof ItemFailure && error.code).toBe('field-not-fillable');
      expect(portal.domInteractionCount()).toBe(0);
    });
  });

  describe('fillFieldByHint', () => {
    test('fills the field found by label', async () => {
      portal.setElements([
        input('textfield-1', { ref: 'a', labelText: 'Numero OdA' }),
        input('textfield-2', { ref: 'b', labelText: 'Codice Fiscale' }),
      ]);

      await navigator.fillFieldByHint({ target: 'tax code', label: 'Codice Fiscale' }, 'X');

      expect(portal.valueOf('b')).toBe('X');
    });

    test('raises field-not-found on ambiguous hints', async () => {
      portal.setElements([
        input('f1', { labelText: 'Data' }),
        input('f2', { labelText: 'Data' }),
      ]);

      const error = await navigator
        .fillFieldByHint({ target: 'date', label: 'Data' }, '01.02.2026')
        .catch((e: unknown) => e);

      expect(error instanceof ItemFailure && error.message).toBe(
        'Campo "date" ambiguo (2 candidati)',
      );
    });
  });

  describe('selectComboOption', () => {
    const trigger = chain('supplier', byName('trigger'));

    test('opens the picker and clicks the option', async () => {
      portal.setElements([element({ ref: 'arrow', name: 'trigger' })]);
      portal.onClick('arrow', (p) =>
        p.addElements(element({ ref: 'opt', tag: 'li', text: 'KK100 - ACME S.R.L.' })),
      );

      const selected = await navigator.selectComboOption(trigger, 'KK100');

      expect(selected).toBe(true);
      expect(portal.clicks()).toEqual(['arrow', 'opt']);
    });

    test('closes the picker when the option is missing', async () => {
      portal.setElements([element({ ref: 'arrow', name: 'trigger' })]);

      const selected = await navigator.selectComboOption(trigger, 'KK100', {
        timeoutMs: 50,
      });

      expect(selected).toBe(false);
      expect(portal.interactions.at(-1)).toEqual({ type: 'pressKey', key: 'Escape' });
    });
  });

  describe('setCheckbox', () => {
    const FLAG = chain('flag', byName('GetItemServiceInfo'));
    const checkbox = (checked: boolean) =>
      input('GetItemServiceInfo', {
        ref: 'flag',
        type: 'button',
        role: 'checkbox',
        attributes: { 'aria-checked': String(checked) },
      });

    test('clicks an unchecked box', async () => {
      portal.setElements([checkbox(false)]);

      await navigator.setCheckbox(FLAG, true);

      expect(portal.clicks()).toEqual(['flag']);
    });

    test('leaves a box already in the wanted state', async () => {
      portal.setElements([checkbox(true)]);

      await navigator.setCheckbox(FLAG, true);

      expect(portal.clicks()).toEqual([]);
    });
  });

  test('attachFile uploads through the resolved input', async () => {
    portal.setElements([input('file', { ref: 'upload', type: 'file' })]);

    await navigator.attachFile(chain('attachment', byName('file')), '/tmp/ts.pdf');

    expect(portal.interactions).toEqual([
      { type: 'upload', ref: 'upload', filePath: '/tmp/ts.pdf' },
    ]);
  });
});
