/**
 * ServerEmbedder
 *
 * Embedding provider backed by the embedding daemon. Availability problems
 * never reach the caller: when the daemon is missing, slow, or serving a model
 * of the wrong size, the call is answered from the hashing embedder instead.
 * After a failure the daemon is left alone for `retryIntervalMs`, then asked
 * again; the warning is logged once per outage.
 */

import { KnowledgeBaseError } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';
import type { EmbeddingClient } from '../server/EmbeddingClient.js';
import { MAX_TEXT_LENGTH } from '../server/protocol.js';
import { HashEmbedder } from './HashEmbedder.js';
import type { EmbeddingProvider, EmbeddingResult } from './types.js';

const log = createLogger('EmbeddingProvider');

const DEFAULT_RETRY_INTERVAL_MS = 5000;

export interface ServerEmbedderOptions {
  client: EmbeddingClient;
  /** Alias the store was indexed with */
  model: string;
  dimensions: number;
  fallback?: HashEmbedder;
  /** Quiet period after a failure before the daemon is asked again (default 5s) */
  retryIntervalMs?: number;
  /** Clock for the retry interval */
  now?: () => number;
}

export class ServerEmbedder implements EmbeddingProvider {
  readonly name = 'server' as const;
  readonly model: string;
  readonly dimensions: number;
  private readonly client: EmbeddingClient;
  private readonly fallback: HashEmbedder;
  private readonly retryIntervalMs: number;
  private readonly now: () => number;
  /** null until the first call decides */
  private available: boolean | null = null;
  /** When the current outage was last confirmed */
  private failedAt = 0;

  constructor(options: ServerEmbedderOptions) {
    this.client = options.client;
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.fallback = options.fallback ?? new HashEmbedder();
    this.retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Whether the last decision was to use the daemon
   */
  get usingServer(): boolean {
    return this.available === true;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embedBatch([text]);
    return result;
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    if (await this.shouldAsk()) {
      try {
        const response = await this.client.embed(
          texts.map(text => text.slice(0, MAX_TEXT_LENGTH)),
          this.dimensions
        );

        if (response.model !== this.model) {
          this.markUnavailable(`daemon serves '${response.model}' but the store is indexed with '${this.model}'`);
        } else {
          this.markAvailable();
          return response.vectors.map(vector => ({ vector, model: this.model, fallback: false }));
        }
      } catch (error) {
        if (!(error instanceof KnowledgeBaseError)) throw error;
        this.markUnavailable(error.message);
      }
    }

    return texts.map(text => ({ vector: this.fallback.vectorize(text), model: this.fallback.model, fallback: true }));
  }

  /**
   * Whether this call should go to the daemon. During an outage the daemon is
   * pinged again once the retry interval has passed.
   */
  private async shouldAsk(): Promise<boolean> {
    if (this.available === true) return true;
    if (this.available === false && this.now() - this.failedAt < this.retryIntervalMs) return false;

    if (await this.client.ping()) return true;
    this.markUnavailable(`no daemon answered at ${this.client.socketPath}`);
    return false;
  }

  private markAvailable(): void {
    if (this.available === false) {
      log.info('Embedding server is back');
    }
    this.available = true;
  }

  private markUnavailable(reason: string): void {
    if (this.available !== false) {
      log.warn(`${reason}. Using hashing fallback; results are approximate until the server is back.`);
    }
    this.available = false;
    this.failedAt = this.now();
  }
}
