import { describe, expect, test, beforeEach, afterEach } from 'vitest';
import { promises as fsp } from 'fs';
import os from 'os';
import path from 'path';
import { acquireProfileLock, CHROME_SINGLETON_LOCK, LOCK_FILE_NAME } from './profile-lock';
import { FatalBotError } from '../errors';

describe('acquireProfileLock', () => {
  let profile: string;

  beforeEach(async () => {
    profile = await fsp.mkdtemp(path.join(os.tmpdir(), 'portal-bot-profile-'));
  });

  afterEach(async () => {
    await fsp.rm(profile, { recursive: true, force: true });
  });

  test('writes the owner pid and removes it on release', async () => {
    const lock = await acquireProfileLock(profile, { pid: 4242 });

    expect(await fsp.readFile(path.join(profile, LOCK_FILE_NAME), 'utf8')).toBe('4242');

    await lock.release();
    await expect(fsp.access(lock.lockPath)).rejects.toThrow();
  });

  test('fails fast when a live process holds the lock', async () => {
    await fsp.writeFile(path.join(profile, LOCK_FILE_NAME), '1111');

    const error = await acquireProfileLock(profile, {
      pid: 4242,
      isProcessAlive: () => true,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FatalBotError);
    expect(error instanceof FatalBotError && error.reason).toBe('profile-locked');
  });

  test('replaces a stale lock left by a dead process', async () => {
    await fsp.writeFile(path.join(profile, LOCK_FILE_NAME), '1111');

    const lock = await acquireProfileLock(profile, {
      pid: 4242,
      isProcessAlive: () => false,
    });

    expect(await fsp.readFile(lock.lockPath, 'utf8')).toBe('4242');
  });

  test('refuses a profile held by a running Chrome', async () => {
    await fsp.symlink(`${os.hostname()}-2222`, path.join(profile, CHROME_SINGLETON_LOCK));

    await expect(
      acquireProfileLock(profile, { pid: 4242, isProcessAlive: (pid) => pid === 2222 }),
    ).rejects.toMatchObject({ reason: 'profile-locked' });
  });

  test('removes a Chrome lock whose process is gone', async () => {
    const singleton = path.join(profile, CHROME_SINGLETON_LOCK);
    await fsp.symlink(`${os.hostname()}-2222`, singleton);

    await acquireProfileLock(profile, { pid: 4242, isProcessAlive: () => false });

    await expect(fsp.lstat(singleton)).rejects.toThrow();
  });

  test('release is idempotent', async () => {
    const lock = await acquireProfileLock(profile, { pid: 4242 });

    await lock.release();
    await expect(lock.release()).resolves.toBeUndefined();
  });

  test('refuses a second holder in the same process until the first releases', async () => {
    const first = await acquireProfileLock(profile);

    await expect(acquireProfileLock(path.join(profile, '.'))).rejects.toMatchObject({
      reason: 'profile-locked',
    });
    expect(await fsp.readFile(first.lockPath, 'utf8')).toBe(String(process.pid));

    await first.release();
    const second = await acquireProfileLock(profile);
    expect(await fsp.readFile(second.lockPath, 'utf8')).toBe(String(process.pid));
    await second.release();
  });

  test('a failed acquire leaves the profile free for the next attempt', async () => {
    const singleton = path.join(profile, CHROME_SINGLETON_LOCK);
    await fsp.symlink(`${os.hostname()}-2222`, singleton);
    await expect(
      acquireProfileLock(profile, { isProcessAlive: (pid) => pid === 2222 }),
    ).rejects.toMatchObject({ reason: 'profile-locked' });

    await fsp.unlink(singleton);
    const lock = await acquireProfileLock(profile);
    expect(await fsp.readFile(lock.lockPath, 'utf8')).toBe(String(process.pid));
    await lock.release();
  });
});
