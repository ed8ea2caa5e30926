/**
 * RequestQueue Tests
 */

import { describe, it, expect } from 'vitest';
import { ServerUnavailableError, TimeoutError } from '../core/errors.js';
import { sleep } from '../utils/process.js';
import { RequestQueue } from './RequestQueue.js';

describe('RequestQueue', () => {
  it('should run jobs one at a time in arrival order', async () => {
    const queue = new RequestQueue();
    const events: string[] = [];

    const job = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await sleep(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.enqueue(job('a', 20)), queue.enqueue(job('b', 1)), queue.enqueue(job('c', 1))]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
    expect(queue.depth).toBe(0);
  });

  it('should keep going after a job fails', async () => {
    const queue = new RequestQueue();

    const failed = queue.enqueue(async () => {
      throw new Error('model crashed');
    });
    const next = queue.enqueue(async () => 'ok');

    await expect(failed).rejects.toThrow('model crashed');
    await expect(next).resolves.toBe('ok');
  });

  it('should time out jobs that wait too long to start', async () => {
    const queue = new RequestQueue({ maxWaitMs: 50 });

    const slow = queue.enqueue(async () => {
      await sleep(200);
      return 'slow';
    });
    const starved = queue.enqueue(async () => 'never');

    await expect(starved).rejects.toBeInstanceOf(TimeoutError);
    await expect(slow).resolves.toBe('slow');
  });

  it('should reject waiting jobs on clear', async () => {
    const queue = new RequestQueue();

    const running = queue.enqueue(async () => {
      await sleep(30);
      return 'done';
    });
    const waiting = queue.enqueue(async () => 'never');
    expect(queue.depth).toBe(2);

    queue.clear(new ServerUnavailableError('shutting down'));

    await expect(waiting).rejects.toBeInstanceOf(ServerUnavailableError);
    await expect(running).resolves.toBe('done');
  });
});
