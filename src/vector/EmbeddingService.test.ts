/**
 * Embedding Service Tests
 *
 * Talks to an in-process stand-in for an OpenAI-compatible /v1/embeddings endpoint.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { DimensionMismatchError } from '../core/errors.js';
import { EmbeddingService } from './EmbeddingService.js';

interface RecordedRequest {
  model: string;
  input: string[];
  dimensions?: number;
}

type Responder = (request: RecordedRequest, attempt: number) => { status: number; vectors?: number[][]; reversed?: boolean };

function encodeEmbedding(vector: number[], format: unknown): number[] | string {
  if (format !== 'base64') return vector;
  return Buffer.from(new Float32Array(vector).buffer).toString('base64');
}

async function readBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString('utf-8'));
  return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
}

describe('EmbeddingService', () => {
  let server: Server;
  let baseURL: string;
  let requests: RecordedRequest[];
  let respond: Responder;

  beforeEach(async () => {
    requests = [];
    respond = request => ({ status: 200, vectors: request.input.map((_, i) => [i, 0.5, 0.25]) });

    server = createServer((req: IncomingMessage, res: ServerResponse) => {
      readBody(req)
        .then(body => {
          const input = Array.isArray(body.input) ? body.input.map(String) : [String(body.input)];
          const request: RecordedRequest = {
            model: String(body.model),
            input,
            ...(typeof body.dimensions === 'number' ? { dimensions: body.dimensions } : {})
          };
          requests.push(request);

          const reply = respond(request, requests.length);
          res.writeHead(reply.status, { 'Content-Type': 'application/json' });
          if (reply.status !== 200 || !reply.vectors) {
            res.end(JSON.stringify({ error: { message: 'upstream failure', type: 'server_error' } }));
            return;
          }

          const data = reply.vectors.map((vector, index) => ({
            object: 'embedding',
            index,
            embedding: encodeEmbedding(vector, body.encoding_format)
          }));
          res.end(JSON.stringify({
            object: 'list',
            data: reply.reversed ? data.reverse() : data,
            model: request.model,
            usage: { prompt_tokens: 1, total_tokens: 1 }
          }));
        })
        .catch(() => {
          res.writeHead(400);
          res.end();
        });
    });

    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('stand-in is not listening on TCP');
    baseURL = `http://127.0.0.1:${address.port}/v1`;
  });

  afterEach(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  function service(overrides: { batchSize?: number; dimensions?: number; sendDimensions?: boolean } = {}): EmbeddingService {
    return new EmbeddingService({
      model: 'test-model',
      dimensions: overrides.dimensions ?? 3,
      baseURL,
      apiKey: 'test-secret',
      batchSize: overrides.batchSize ?? 64,
      sendDimensions: overrides.sendDimensions,
      maxRetries: 3,
      retryDelayMs: 1
    });
  }

  it('should embed in batches and keep input order', async () => {
    const vectors = await service({ batchSize: 2 }).embedBatch(['a', 'b', 'c']);

    expect(requests.map(r => r.input)).toEqual([['a', 'b'], ['c']]);
    expect(vectors.map(v => Array.from(v))).toEqual([[0, 0.5, 0.25], [1, 0.5, 0.25], [0, 0.5, 0.25]]);
  });

  it('should order results by their index', async () => {
    respond = request => ({ status: 200, vectors: request.input.map((_, i) => [i, 0, 0]), reversed: true });

    const vectors = await service().embedBatch(['first', 'second']);

    expect(vectors.map(v => v[0])).toEqual([0, 1]);
  });

  it('should send dimensions only to models that can shorten', async () => {
    await service().embed('x');
    await service({ sendDimensions: true }).embed('x');

    expect(requests[0].dimensions).toBeUndefined();
    expect(requests[1].dimensions).toBe(3);
  });

  it('should retry server errors', async () => {
    respond = (request, attempt) =>
      attempt < 3 ? { status: 500 } : { status: 200, vectors: request.input.map(() => [1, 0, 0]) };

    const vector = await service().embed('x');

    expect(Array.from(vector)).toEqual([1, 0, 0]);
    expect(requests).toHaveLength(3);
  });

  it('should reject vectors of the wrong size', async () => {
    await expect(service({ dimensions: 4 }).embed('x')).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(requests).toHaveLength(1);
  });
});
