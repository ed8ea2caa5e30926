/**
 * Embedding Server Tests
 *
 * Runs the server in-process on a temporary Unix socket with the lite backend.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type Server, type Socket } from 'net';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { HashEmbedder } from '../vector/HashEmbedder.js';
import { ServerEmbedder } from '../vector/ServerEmbedder.js';
import { EmbeddingClient } from './EmbeddingClient.js';
import { EmbeddingServer } from './EmbeddingServer.js';
import { LiteBackend } from './ModelBackend.js';
import { MAX_TEXT_LENGTH } from './protocol.js';
import { resolveModel } from './models.js';

describe('EmbeddingServer', () => {
  let dir: string;
  let socketPath: string;
  let server: EmbeddingServer;
  let client: EmbeddingClient;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-srv-'));
    socketPath = join(dir, 'embedder.sock');
    server = new EmbeddingServer({ socketPath, backend: new LiteBackend(resolveModel('lite')) });
    await server.start();
    client = new EmbeddingClient({ socketPath, pingTimeoutMs: 1000, requestTimeoutMs: 5000 });
  });

  afterEach(async () => {
    await server.stop();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should report its status', async () => {
    const status = await client.status();

    expect(status.running).toBe(true);
    expect(status.model).toBe('lite');
    expect(status.dimensions).toBe(384);
    expect(status.pid).toBe(process.pid);
    expect(status.queueDepth).toBe(0);
    expect(await client.ping()).toBe(true);
  });

  it('should embed texts in order', async () => {
    const hasher = new HashEmbedder();
    const result = await client.embed(['MACD crossover', 'volume spikes'], 384);

    expect(result.model).toBe('lite');
    expect(result.dimensions).toBe(384);
    expect(Array.from(result.vectors[0])).toEqual(Array.from(hasher.vectorize('MACD crossover')));
    expect(Array.from(result.vectors[1])).toEqual(Array.from(hasher.vectorize('volume spikes')));
  });

  it('should split large batches across requests', async () => {
    const texts = Array.from({ length: 70 }, (_, i) => `note number ${i}`);
    const result = await client.embed(texts);
    expect(result.vectors).toHaveLength(70);
  });

  it('should refuse a dimensionality it does not serve', async () => {
    await expect(client.embed(['x'], 768)).rejects.toMatchObject({ code: 'DimensionMismatch' });
  });

  it('should refuse oversized texts', async () => {
    await expect(client.embed(['a'.repeat(MAX_TEXT_LENGTH + 1)])).rejects.toMatchObject({ code: 'RequestTooLarge' });
  });

  it('should report model changes as needing a restart', async () => {
    expect(await client.setModel('nomic')).toEqual({ current: 'lite', requested: 'nomic', restartRequired: true });
    expect(await client.setModel('lite')).toEqual({ current: 'lite', requested: 'lite', restartRequired: false });
    await expect(client.setModel('bogus')).rejects.toMatchObject({ code: 'InvalidModel' });
  });

  it('should stop on request', async () => {
    await server.stop();

    let stopped: () => void = () => undefined;
    const done = new Promise<void>(resolve => {
      stopped = resolve;
    });
    server = new EmbeddingServer({ socketPath, backend: new LiteBackend(resolveModel('lite')), onShutdown: () => stopped() });
    await server.start();

    await client.shutdown();
    await done;

    expect(server.running).toBe(false);
    expect(await client.ping()).toBe(false);
  });

  describe('ServerEmbedder', () => {
    it('should use the daemon when it serves the store model', async () => {
      const embedder = new ServerEmbedder({ client, model: 'lite', dimensions: 384 });
      const [result] = await embedder.embedBatch(['MACD crossover']);

      expect(result.fallback).toBe(false);
      expect(result.model).toBe('lite');
      expect(embedder.usingServer).toBe(true);
    });

    it('should fall back when the daemon serves another size', async () => {
      const embedder = new ServerEmbedder({ client, model: 'nomic', dimensions: 768 });
      const result = await embedder.embed('MACD crossover');

      expect(result.fallback).toBe(true);
      expect(result.model).toBe('lite');
      expect(embedder.usingServer).toBe(false);
    });
  });
});

describe('ServerEmbedder fallback', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-fallback-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should go back to the daemon once it starts after a fallback', async () => {
    const socketPath = join(dir, 'embedder.sock');
    let clock = 0;
    const embedder = new ServerEmbedder({
      client: new EmbeddingClient({ socketPath, pingTimeoutMs: 200, requestTimeoutMs: 2000 }),
      model: 'lite',
      dimensions: 384,
      retryIntervalMs: 1000,
      now: () => clock
    });

    const before = await embedder.embed('MACD crossover');
    expect(before.fallback).toBe(true);

    const server = new EmbeddingServer({ socketPath, backend: new LiteBackend(resolveModel('lite')) });
    await server.start();
    try {
      clock = 500;
      expect((await embedder.embed('MACD crossover')).fallback).toBe(true);

      clock = 1500;
      const after = await embedder.embed('MACD crossover');
      expect(after.fallback).toBe(false);
      expect(after.model).toBe('lite');
      expect(embedder.usingServer).toBe(true);
    } finally {
      await server.stop();
    }
  });

  it('should answer the same whether the daemon is missing or unresponsive', async () => {
    const missing = new ServerEmbedder({
      client: new EmbeddingClient({ socketPath: join(dir, 'absent.sock'), pingTimeoutMs: 100 }),
      model: 'nomic',
      dimensions: 768
    });

    // Accepts connections and never answers
    const sockets: Socket[] = [];
    const silent: Server = createServer(socket => {
      sockets.push(socket);
    });
    const silentPath = join(dir, 'silent.sock');
    await new Promise<void>(resolve => silent.listen(silentPath, () => resolve()));

    try {
      const hung = new ServerEmbedder({
        client: new EmbeddingClient({ socketPath: silentPath, pingTimeoutMs: 100 }),
        model: 'nomic',
        dimensions: 768
      });

      const texts = ['MACD crossover', 'volume spikes'];
      const fromMissing = await missing.embedBatch(texts);
      const fromHung = await hung.embedBatch(texts);

      expect(fromMissing.map(r => r.fallback)).toEqual([true, true]);
      expect(fromHung.map(r => r.fallback)).toEqual([true, true]);
      expect(fromHung.map(r => Array.from(r.vector))).toEqual(fromMissing.map(r => Array.from(r.vector)));
      expect(fromHung[0].vector.length).toBe(384);
    } finally {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>(resolve => silent.close(() => resolve()));
    }
  });
});
