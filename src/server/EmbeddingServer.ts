/**
 * EmbeddingServer
 *
 * HTTP server on a local Unix socket that holds one loaded model and answers
 * embedding requests. Endpoints:
 *   GET  /status   : loaded model, pid, queue depth
 *   POST /embed    : { texts, expectedDimensions? } → { vectors, model, dimensions }
 *   POST /model    : { alias } → { current, requested, restartRequired }
 *   POST /shutdown : stop serving
 *
 * The model is never hot-swapped: a different alias is reported as requiring
 * a restart.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { rmSync } from 'fs';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  DimensionMismatchError,
  InvalidRequestError,
  RequestTooLargeError,
  ServerUnavailableError,
  getErrorMessage
} from '../core/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ModelBackend } from './ModelBackend.js';
import { REGISTRY_VERSION, resolveModel } from './models.js';
import {
  EmbedRequestSchema,
  MAX_BODY_BYTES,
  MAX_TEXT_LENGTH,
  MAX_TEXTS_PER_REQUEST,
  ModelRequestSchema,
  ROUTES,
  serializeError,
  type EmbedResponse,
  type ModelResponse,
  type StatusResponse
} from './protocol.js';
import { RequestQueue } from './RequestQueue.js';

const log = createLogger('EmbeddingServer');

export interface EmbeddingServerOptions {
  socketPath: string;
  backend: ModelBackend;
  /** How long a request may wait for the model before failing with Timeout */
  maxWaitMs?: number;
  /** Called after POST /shutdown has been answered */
  onShutdown?: () => void;
}

class BodyTooLarge extends Error {}

export class EmbeddingServer {
  private server: Server | null = null;
  private readonly socketPath: string;
  private readonly backend: ModelBackend;
  private readonly queue: RequestQueue;
  private readonly onShutdown?: () => void;
  private startedAt = '';
  private isRunning = false;

  constructor(options: EmbeddingServerOptions) {
    this.socketPath = options.socketPath;
    this.backend = options.backend;
    this.queue = new RequestQueue(options.maxWaitMs !== undefined ? { maxWaitMs: options.maxWaitMs } : {});
    this.onShutdown = options.onShutdown;
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Start listening. The backend must already be loaded.
   */
  async start(): Promise<void> {
    if (this.isRunning) return;

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch(error => {
        log.error('Unhandled request failure:', getErrorMessage(error));
        this.sendError(res, error);
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });

    server.on('error', error => {
      log.error('Server error:', getErrorMessage(error));
    });

    this.server = server;
    this.isRunning = true;
    this.startedAt = new Date().toISOString();
    log.info(`Listening on ${this.socketPath} with model ${this.backend.spec.alias}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!this.isRunning || !server) return;

    this.isRunning = false;
    this.server = null;
    this.queue.clear(new ServerUnavailableError('server is shutting down'));

    await new Promise<void>(resolve => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    rmSync(this.socketPath, { force: true });
    log.info('Stopped');
  }

  status(): StatusResponse {
    return {
      running: this.isRunning,
      model: this.backend.spec.alias,
      dimensions: this.backend.spec.dimensions,
      pid: process.pid,
      startedAt: this.startedAt,
      queueDepth: this.queue.depth,
      registryVersion: REGISTRY_VERSION
    };
  }

  // ==========================================
  // REQUEST HANDLING
  // ==========================================

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = req.url || '';
    const method = req.method || 'GET';

    try {
      if (url === ROUTES.status && method === 'GET') {
        this.sendJson(res, 200, this.status());
        return;
      }

      if (method !== 'POST') {
        throw new InvalidRequestError(`${method} ${url} is not supported`);
      }

      switch (url) {
        case ROUTES.embed:
          this.sendJson(res, 200, await this.handleEmbed(req));
          return;
        case ROUTES.model:
          this.sendJson(res, 200, await this.handleModel(req));
          return;
        case ROUTES.shutdown:
          this.sendJson(res, 200, { stopping: true });
          setImmediate(() => {
            void this.stop()
              .catch(error => log.error('Shutdown failed:', getErrorMessage(error)))
              .finally(() => this.onShutdown?.());
          });
          return;
        default:
          throw new InvalidRequestError(`unknown route ${url}`);
      }
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async handleEmbed(req: IncomingMessage): Promise<EmbedResponse> {
    const request = await this.readJson(req, EmbedRequestSchema);
    const { spec } = this.backend;

    if (request.texts.length > MAX_TEXTS_PER_REQUEST) {
      throw new RequestTooLargeError(`${request.texts.length} texts (limit ${MAX_TEXTS_PER_REQUEST})`);
    }
    const oversized = request.texts.findIndex(text => text.length > MAX_TEXT_LENGTH);
    if (oversized !== -1) {
      throw new RequestTooLargeError(
        `text ${oversized} has ${request.texts[oversized].length} characters (limit ${MAX_TEXT_LENGTH})`
      );
    }
    if (request.expectedDimensions !== undefined && request.expectedDimensions !== spec.dimensions) {
      throw new DimensionMismatchError(
        request.expectedDimensions,
        spec.dimensions,
        `The server has '${spec.alias}' loaded`
      );
    }

    const vectors = request.texts.length === 0
      ? []
      : await this.queue.enqueue(() => this.backend.embed(request.texts));

    return {
      vectors: vectors.map(vector => Array.from(vector)),
      model: spec.alias,
      dimensions: spec.dimensions
    };
  }

  private async handleModel(req: IncomingMessage): Promise<ModelResponse> {
    const request = await this.readJson(req, ModelRequestSchema);
    const requested = resolveModel(request.alias);
    const current = this.backend.spec.alias;

    return {
      current,
      requested: requested.alias,
      restartRequired: requested.alias !== current
    };
  }

  // ==========================================
  // IO HELPERS
  // ==========================================

  private async readJson<T>(req: IncomingMessage, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    let text: string;
    try {
      text = await this.readBody(req);
    } catch (error) {
      if (error instanceof BodyTooLarge) {
        throw new RequestTooLargeError(`body exceeds ${MAX_BODY_BYTES} bytes`);
      }
      throw error;
    }

    let data: unknown;
    try {
      data = text.length === 0 ? {} : JSON.parse(text);
    } catch (error) {
      throw new InvalidRequestError(`body is not JSON: ${getErrorMessage(error)}`);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidRequestError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    }
    return parsed.data;
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let overflow = false;

      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > MAX_BODY_BYTES) {
          // Keep draining so the client still receives the error response
          overflow = true;
          chunks.length = 0;
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        if (overflow) {
          reject(new BodyTooLarge());
          return;
        }
        resolve(Buffer.concat(chunks).toString('utf-8'));
      });

      req.on('error', reject);
    });
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    if (res.headersSent) return;
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  private sendError(res: ServerResponse, error: unknown): void {
    const { status, body } = serializeError(error);
    if (status >= 500) {
      log.error(`Request failed (${body.error.code}):`, body.error.message);
    }
    this.sendJson(res, status, body);
  }
}
