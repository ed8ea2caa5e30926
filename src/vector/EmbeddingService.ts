/**
 * Embedding Service
 *
 * Generates vector embeddings through an OpenAI-compatible `/v1/embeddings`
 * endpoint (a local model runner or a hosted API). The embedding daemon uses
 * it to serve every non-lite model alias.
 *
 * Features:
 * - Configurable timeout (default 30s)
 * - Retry with exponential backoff (default 3 retries)
 * - Returned dimensionality is checked against the registry
 */

import OpenAI from 'openai';
import { DimensionMismatchError, getErrorMessage } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';
import { sleep } from '../utils/process.js';
import type { EmbeddingServiceConfig } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;

const log = createLogger('EmbeddingService');

export class EmbeddingService {
  private client: OpenAI;
  private config: EmbeddingServiceConfig;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(config: EmbeddingServiceConfig) {
    this.config = config;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0 // We handle retries ourselves for better control
    });
  }

  async embed(text: string): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  /**
   * Embed texts in chunks of `batchSize`, preserving input order
   */
  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) {
      return [];
    }

    const embeddings: Float32Array[] = [];
    const totalBatches = Math.ceil(texts.length / this.config.batchSize);

    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      const batch = texts.slice(i, i + this.config.batchSize);
      const batchNum = Math.floor(i / this.config.batchSize) + 1;
      embeddings.push(...(await this.embedChunkWithRetry(batch, batchNum, totalBatches)));
    }

    return embeddings;
  }

  private async embedChunkWithRetry(
    batch: string[],
    batchNum: number,
    totalBatches: number,
    attempt = 1
  ): Promise<Float32Array[]> {
    try {
      const response = await this.client.embeddings.create({
        model: this.config.model,
        input: batch,
        ...(this.config.sendDimensions ? { dimensions: this.config.dimensions } : {})
      });

      // The API may return items out of order; `index` is authoritative
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      return ordered.map(item => {
        if (item.embedding.length !== this.config.dimensions) {
          throw new DimensionMismatchError(this.config.dimensions, item.embedding.length, `model ${this.config.model}`);
        }
        return new Float32Array(item.embedding);
      });
    } catch (error) {
      if (this.isRetryableError(error) && attempt < this.maxRetries) {
        const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
        log.warn(`Batch ${batchNum}/${totalBatches} retry ${attempt}/${this.maxRetries} after ${delay}ms:`, getErrorMessage(error));
        await sleep(delay);
        return this.embedChunkWithRetry(batch, batchNum, totalBatches, attempt + 1);
      }

      log.error(`Batch ${batchNum}/${totalBatches} failed after ${attempt} attempt(s):`, getErrorMessage(error));
      throw error;
    }
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      return status === undefined || status === 429 || status >= 500;
    }
    if (error instanceof Error) {
      const message = error.message.toLowerCase();
      // Retry on timeout, rate limit, or transient connection errors
      return (
        message.includes('timeout') ||
        message.includes('econnreset') ||
        message.includes('rate limit')
      );
    }
    return false;
  }

  getDimensions(): number {
    return this.config.dimensions;
  }

  getModel(): string {
    return this.config.model;
  }
}
