/**
 * EmbeddingClient
 *
 * Client-side handle to the embedding daemon. Every call is bounded by a
 * timeout; nothing here waits on the daemon indefinitely.
 */

import { request } from 'http';
import { join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  KnowledgeBaseError,
  ServerUnavailableError,
  TimeoutError,
  getErrorMessage
} from '../core/errors.js';
import {
  EmbedResponseSchema,
  MAX_TEXTS_PER_REQUEST,
  ModelResponseSchema,
  ROUTES,
  SOCKET_FILE,
  ShutdownResponseSchema,
  StatusResponseSchema,
  deserializeError,
  type ModelResponse,
  type StatusResponse
} from './protocol.js';

export interface EmbeddingClientConfig {
  socketPath: string;
  /** Timeout for status checks (default 500ms) */
  pingTimeoutMs: number;
  /** Timeout for embed and model calls (default 30s) */
  requestTimeoutMs: number;
}

export interface EmbedBatchResult {
  vectors: Float32Array[];
  model: string;
  dimensions: number;
}

const CONNECT_ERRORS = new Set(['ENOENT', 'ECONNREFUSED', 'ENOTSOCK', 'ECONNRESET', 'EPIPE', 'EACCES']);

export function socketPathFor(runtimeDir: string): string {
  return join(runtimeDir, SOCKET_FILE);
}

export class EmbeddingClient {
  private readonly config: EmbeddingClientConfig;

  constructor(config: Partial<EmbeddingClientConfig> & { socketPath: string }) {
    this.config = {
      pingTimeoutMs: 500,
      requestTimeoutMs: 30000,
      ...config
    };
  }

  get socketPath(): string {
    return this.config.socketPath;
  }

  /**
   * @throws {ServerUnavailableError | TimeoutError}
   */
  status(timeoutMs: number = this.config.pingTimeoutMs): Promise<StatusResponse> {
    return this.call('GET', ROUTES.status, undefined, StatusResponseSchema, timeoutMs);
  }

  /**
   * True when a daemon answers /status within the ping timeout
   */
  async ping(): Promise<boolean> {
    try {
      await this.status();
      return true;
    } catch (error) {
      if (error instanceof KnowledgeBaseError) return false;
      throw error;
    }
  }

  /**
   * Embed texts, splitting into requests of at most 64 and reassembling in order.
   */
  async embed(texts: string[], expectedDimensions?: number): Promise<EmbedBatchResult> {
    const vectors: Float32Array[] = [];
    let model = '';
    let dimensions = expectedDimensions ?? 0;

    for (let i = 0; i < texts.length; i += MAX_TEXTS_PER_REQUEST) {
      const chunk = texts.slice(i, i + MAX_TEXTS_PER_REQUEST);
      const response = await this.call(
        'POST',
        ROUTES.embed,
        { texts: chunk, expectedDimensions },
        EmbedResponseSchema,
        this.config.requestTimeoutMs
      );

      if (response.vectors.length !== chunk.length) {
        throw new ServerUnavailableError(`expected ${chunk.length} vectors, received ${response.vectors.length}`);
      }
      vectors.push(...response.vectors.map(vector => Float32Array.from(vector)));
      model = response.model;
      dimensions = response.dimensions;
    }

    return { vectors, model, dimensions };
  }

  setModel(alias: string): Promise<ModelResponse> {
    return this.call('POST', ROUTES.model, { alias }, ModelResponseSchema, this.config.requestTimeoutMs);
  }

  async shutdown(): Promise<void> {
    await this.call('POST', ROUTES.shutdown, {}, ShutdownResponseSchema, this.config.requestTimeoutMs);
  }

  private call<T>(
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
    timeoutMs: number
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const payload = body === undefined ? undefined : JSON.stringify(body);
      let settled = false;

      const finish = (error: Error | null, value?: T): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else if (value !== undefined) {
          resolve(value);
        }
      };

      const req = request(
        {
          socketPath: this.config.socketPath,
          path,
          method,
          headers: payload === undefined
            ? {}
            : { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(payload) }
        },
        res => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('error', error => finish(new ServerUnavailableError(error.message, { cause: error })));
          res.on('end', () => {
            let data: unknown;
            try {
              data = JSON.parse(Buffer.concat(chunks).toString('utf-8'));
            } catch (error) {
              finish(new ServerUnavailableError(`non-JSON response from ${path}`, { cause: error }));
              return;
            }

            const remote = deserializeError(data);
            if (remote) {
              finish(remote);
              return;
            }

            const parsed = schema.safeParse(data);
            if (!parsed.success) {
              finish(new ServerUnavailableError(`unexpected response from ${path}`));
              return;
            }
            finish(null, parsed.data);
          });
        }
      );

      const timer = setTimeout(() => {
        finish(new TimeoutError(`${method} ${path}`, timeoutMs));
        req.destroy();
      }, timeoutMs);

      req.on('error', error => {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
        const detail = CONNECT_ERRORS.has(code)
          ? `no daemon at ${this.config.socketPath} (${code})`
          : getErrorMessage(error);
        finish(new ServerUnavailableError(detail, { cause: error }));
      });

      if (payload !== undefined) {
        req.write(payload);
      }
      req.end();
    });
  }
}
