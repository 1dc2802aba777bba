import { describe, expect, test, vi } from 'vitest';
import { RunReporter } from './run-reporter';
import { InputChannel } from './input-channel';
import { buildOutcome } from '../types';

describe('RunReporter', () => {
  test('forwards messages to the log sink', () => {
    const log = vi.fn();
    new RunReporter({ log }).log('Login effettuato');

    expect(log).toHaveBeenCalledWith('Login effettuato');
  });

  test('swallows sink exceptions', () => {
    const reporter = new RunReporter({
      log: () => {
        throw new Error('ui gone');
      },
      progress: () => {
        throw new Error('ui gone');
      },
    });

    expect(() => reporter.log('x')).not.toThrow();
    expect(() => reporter.progress('8500123', buildOutcome('success', ''))).not.toThrow();
  });

  test('emits one progress call per item with code and detail', () => {
    const progress = vi.fn();
    const reporter = new RunReporter({ progress });

    reporter.progress('8500123', buildOutcome('success', '8500123.xlsx'));
    reporter.progress('row-2', buildOutcome('missing-identifier', 'Numero OdA vuoto'));

    expect(progress.mock.calls).toEqual([
      ['8500123', 'success', '8500123.xlsx'],
      ['row-2', 'missing-identifier', 'Numero OdA vuoto'],
    ]);
    expect(reporter.summary()).toEqual({
      processed: 2,
      succeeded: 1,
      failed: 1,
      byCode: { success: 1, 'missing-identifier': 1 },
    });
  });

  test('requestInput resolves to null without a channel', async () => {
    await expect(new RunReporter().requestInput('Nome?')).resolves.toBeNull();
  });

  test('requestInput goes through the input channel', async () => {
    const channel = new InputChannel();
    channel.onRequest((request) => channel.respond(request.id, 'nuovo'));

    await expect(new RunReporter({}, channel).requestInput('Nome?')).resolves.toBe('nuovo');
  });
});
