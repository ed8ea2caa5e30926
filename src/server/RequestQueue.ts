/**
 * RequestQueue
 *
 * Runs jobs one at a time in arrival order. A loaded model is not assumed to
 * be safe for concurrent use, so every embed request funnels through here.
 * A job that has not started within `maxWaitMs` is dropped with a Timeout.
 */

import { TimeoutError } from '../core/errors.js';

export interface RequestQueueConfig {
  maxWaitMs: number;
}

const DEFAULT_CONFIG: RequestQueueConfig = {
  maxWaitMs: 30000
};

interface QueuedJob {
  run: () => Promise<void>;
  cancel: (reason: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  started: boolean;
}

export class RequestQueue {
  private jobs: QueuedJob[] = [];
  private running = false;
  private config: RequestQueueConfig;

  constructor(config: Partial<RequestQueueConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Jobs waiting plus the one in progress
   */
  get depth(): number {
    return this.jobs.length + (this.running ? 1 : 0);
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const job: QueuedJob = {
        started: false,
        cancel: reject,
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
        timer: setTimeout(() => {
          if (job.started) return;
          this.jobs = this.jobs.filter(queued => queued !== job);
          reject(new TimeoutError('Queued embedding request', this.config.maxWaitMs));
        }, this.config.maxWaitMs)
      };

      this.jobs.push(job);
      void this.drain();
    });
  }

  /**
   * Reject everything still waiting (used on shutdown)
   */
  clear(reason: Error): void {
    const waiting = this.jobs;
    this.jobs = [];
    for (const job of waiting) {
      clearTimeout(job.timer);
      job.cancel(reason);
    }
  }

  private async drain(): Promise<void> {
    if (this.running) return;
    this.running = true;

    try {
      let job = this.jobs.shift();
      while (job) {
        clearTimeout(job.timer);
        job.started = true;
        await job.run();
        job = this.jobs.shift();
      }
    } finally {
      this.running = false;
    }
  }
}
