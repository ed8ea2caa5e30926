/**
 * WriteLock Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StoreLockedError } from '../core/errors.js';
import { WriteLock } from './WriteLock.js';

describe('WriteLock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-lock-'));
    lockPath = join(dir, '_lock');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should hold the lock file only while running', async () => {
    const lock = new WriteLock(lockPath);

    const seen = await lock.runExclusive(() => readFileSync(lockPath, 'utf-8'));

    expect(seen.split('\n')[0]).toBe(String(process.pid));
    expect(existsSync(lockPath)).toBe(false);
    expect(lock.held).toBe(false);
  });

  it('should release the lock when the callback throws', async () => {
    const lock = new WriteLock(lockPath);

    await expect(lock.runExclusive(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(existsSync(lockPath)).toBe(false);
  });

  describe('writers in one process', () => {
    it('should run overlapping writers one after another', async () => {
      const first = new WriteLock(lockPath);
      const second = new WriteLock(lockPath);
      const events: string[] = [];

      let releaseFirst = (): void => undefined;
      const firstDone = first.runExclusive(async () => {
        events.push('first:start');
        await new Promise<void>(resolve => {
          releaseFirst = resolve;
        });
        events.push('first:end');
      });
      const secondDone = second.runExclusive(() => {
        events.push('second');
      });

      await new Promise(resolve => setTimeout(resolve, 20));
      expect(events).toEqual(['first:start']);

      releaseFirst();
      await Promise.all([firstDone, secondDone]);
      expect(events).toEqual(['first:start', 'first:end', 'second']);
      expect(existsSync(lockPath)).toBe(false);
    });

    it('should skip instead of waiting in tryRunExclusive', async () => {
      const writer = new WriteLock(lockPath);
      const reader = new WriteLock(lockPath);
      let ran = false;

      const skipped = await writer.runExclusive(() => reader.tryRunExclusive(() => {
        ran = true;
      }));

      expect(skipped).toBe(false);
      expect(ran).toBe(false);
      expect(await reader.tryRunExclusive(() => undefined)).toBe(true);
    });

    it('should treat our pid as busy when another lock of this process holds the file', async () => {
      const alias = join(dir, 'alias');
      symlinkSync(dir, alias);
      const direct = new WriteLock(lockPath);
      const viaAlias = new WriteLock(join(alias, '_lock'));

      await direct.runExclusive(async () => {
        await expect(viaAlias.runExclusive(() => undefined)).rejects.toBeInstanceOf(StoreLockedError);
        expect(existsSync(lockPath)).toBe(true);
      });
      expect(existsSync(lockPath)).toBe(false);
    });

    it('should take over a file with our pid that no lock holds', async () => {
      writeFileSync(lockPath, `${process.pid}\nleft-behind\n`);
      const lock = new WriteLock(lockPath);

      expect(await lock.runExclusive(() => true)).toBe(true);
      expect(existsSync(lockPath)).toBe(false);
    });
  });

  it('should refuse a lock held by a live process', async () => {
    writeFileSync(lockPath, String(process.ppid));
    const lock = new WriteLock(lockPath);

    await expect(lock.runExclusive(() => undefined)).rejects.toBeInstanceOf(StoreLockedError);
    expect(readFileSync(lockPath, 'utf-8')).toBe(String(process.ppid));
  });

  it('should take over a lock left by a dead process', async () => {
    writeFileSync(lockPath, '999999999');
    const lock = new WriteLock(lockPath);

    const ran = await lock.runExclusive(() => true);
    expect(ran).toBe(true);
    expect(existsSync(lockPath)).toBe(false);
  });
});
