/**
 * WriteLock
 *
 * Single-writer guard for a store. Writers inside this process queue on a
 * mutex shared by every WriteLock on the same lock path; across processes
 * `<store>/_lock` is created exclusively and holds the writer's pid. A lock
 * left behind by a dead process is taken over.
 *
 * The lock is not re-entrant: code running under it calls the unlocked
 * internals instead of taking it again.
 */

import { readFileSync, rmSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import { StoreLockedError } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';
import { isProcessRunning, readPidFile } from '../utils/process.js';

const log = createLogger('WriteLock');

/** One queue per lock file, shared by every instance in the process */
const writers = new Map<string, Mutex>();

/** Tokens of the locks this process currently holds */
const heldTokens = new Set<string>();

function writerQueue(lockPath: string): Mutex {
  let mutex = writers.get(lockPath);
  if (!mutex) {
    mutex = new Mutex();
    writers.set(lockPath, mutex);
  }
  return mutex;
}

/**
 * Second line of the lock file, written after the pid
 */
function readToken(lockPath: string): string | null {
  try {
    return readFileSync(lockPath, 'utf-8').split('\n')[1]?.trim() || null;
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return null;
    throw error;
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class WriteLock {
  private readonly lockPath: string;
  private readonly queue: Mutex;
  private token: string | null = null;

  constructor(lockPath: string) {
    this.lockPath = resolve(lockPath);
    this.queue = writerQueue(this.lockPath);
  }

  /**
   * Run `fn` while holding the lock, after any writer of this process that
   * got there first.
   *
   * @throws {StoreLockedError} If another process holds the lock
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.queue.runExclusive(async () => {
      this.acquire();
      try {
        return await fn();
      } finally {
        this.release();
      }
    });
  }

  /**
   * Like runExclusive, but gives up instead of queueing when a writer of
   * this process is active. Resolves to whether `fn` ran.
   *
   * @throws {StoreLockedError} If another process holds the lock
   */
  async tryRunExclusive(fn: () => Promise<void> | void): Promise<boolean> {
    if (this.queue.isLocked()) return false;
    await this.runExclusive(fn);
    return true;
  }

  /** True while any writer of this process holds or waits for the store */
  get held(): boolean {
    return this.queue.isLocked();
  }

  private acquire(): void {
    for (let attempt = 0; attempt < 2; attempt++) {
      const token = uuidv4();
      try {
        writeFileSync(this.lockPath, `${process.pid}\n${token}\n`, { flag: 'wx' });
        heldTokens.add(token);
        this.token = token;
        return;
      } catch (error) {
        if (!hasCode(error, 'EEXIST')) throw error;
      }

      const owner = readPidFile(this.lockPath);
      if (owner !== null && owner !== process.pid && isProcessRunning(owner)) {
        throw new StoreLockedError(owner);
      }
      // Our own pid is only stale when no lock of this process wrote the file
      const holder = readToken(this.lockPath);
      if (owner === process.pid && holder !== null && heldTokens.has(holder)) {
        throw new StoreLockedError(owner);
      }

      log.warn(`Removing stale lock left by pid ${owner ?? 'unknown'}`);
      rmSync(this.lockPath, { force: true });
    }

    const owner = readPidFile(this.lockPath);
    throw new StoreLockedError(owner ?? -1);
  }

  private release(): void {
    if (this.token === null) return;
    heldTokens.delete(this.token);
    if (readToken(this.lockPath) === this.token) {
      rmSync(this.lockPath, { force: true });
    }
    this.token = null;
  }
}
