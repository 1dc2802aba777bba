import { describe, expect, test } from 'vitest';
import { inspect } from 'util';
import { Credentials } from './credentials';

describe('Credentials', () => {
  const credentials = new Credentials('test-user', 'test-secret');

  test('exposes the password only through the accessor', () => {
    expect(credentials.password).toBe('test-secret');
    expect(credentials.isComplete).toBe(true);
  });

  test('never serialises the password', () => {
    expect(JSON.stringify({ credentials })).toBe(
      '{"credentials":{"username":"test-user","password":"***"}}',
    );
    expect(inspect(credentials)).toBe('Credentials(test-user)');
    expect(String(credentials)).toBe('Credentials(test-user)');
  });

  test('is incomplete without a password', () => {
    expect(new Credentials('test-user', '').isComplete).toBe(false);
  });
});
