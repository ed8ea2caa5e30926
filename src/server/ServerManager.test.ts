/**
 * ServerManager Tests
 *
 * The daemon is stood in for by an in-process EmbeddingServer on the
 * manager's socket, so nothing is spawned.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type Socket } from 'net';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InvalidModelError, ServerStartFailureError } from '../core/errors.js';
import { loadGlobalSettings } from '../config/ConfigLoader.js';
import { EmbeddingServer } from './EmbeddingServer.js';
import { LiteBackend } from './ModelBackend.js';
import { resolveModel } from './models.js';
import { isProcessRunning } from '../utils/process.js';
import { isDaemonCommand, ServerManager } from './ServerManager.js';

describe('ServerManager', () => {
  let dir: string;
  let globalConfigPath: string;
  let manager: ServerManager;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-mgr-'));
    globalConfigPath = join(dir, 'config', 'config.yaml');
    manager = new ServerManager({ runtimeDir: dir, globalConfigPath, pingTimeoutMs: 200, requestTimeoutMs: 2000 });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should report a stopped server with the configured model', async () => {
    expect(await manager.status()).toEqual({
      running: false,
      socketPath: join(dir, 'embedder.sock'),
      configuredModel: 'nomic'
    });
    expect(await manager.stop()).toBe(false);
  });

  it('should drop a pid file whose process is not the daemon without signalling it', async () => {
    writeFileSync(manager.pidPath, String(process.ppid));

    expect(await manager.stop()).toBe(false);
    expect(existsSync(manager.pidPath)).toBe(false);
    expect(isProcessRunning(process.ppid)).toBe(true);
  });

  describe('isDaemonCommand', () => {
    const script = '/opt/arbor/dist/server/daemon.js';

    it('should recognize the daemon of this runtime directory', () => {
      expect(isDaemonCommand(`/usr/bin/node ${script} --model lite --runtime-dir /tmp/rt`, script, '/tmp/rt')).toBe(true);
      expect(
        isDaemonCommand('node --import tsx /src/server/daemon.ts --model nomic --runtime-dir /tmp/rt', '/src/server/daemon.ts', '/tmp/rt')
      ).toBe(true);
    });

    it('should reject other processes and other runtime directories', () => {
      expect(isDaemonCommand('sleep 30', script, '/tmp/rt')).toBe(false);
      expect(isDaemonCommand(`/usr/bin/node ${script} --model lite --runtime-dir /tmp/other`, script, '/tmp/rt')).toBe(false);
      expect(isDaemonCommand(`/usr/bin/node ${script} --model lite`, script, '/tmp/rt')).toBe(false);
    });
  });

  it('should save the model selection while stopped', async () => {
    expect(await manager.setModel('minilm')).toEqual({ model: 'minilm', running: false, restartRequired: false });
    expect(loadGlobalSettings(globalConfigPath).serverModel).toBe('minilm');
    expect(manager.configuredModel()).toBe('minilm');
    await expect(manager.setModel('bogus')).rejects.toBeInstanceOf(InvalidModelError);
  });

  it('should list the registry', () => {
    expect(manager.models().map(spec => spec.alias)).toContain('lite');
  });

  describe('with a running server', () => {
    let server: EmbeddingServer;

    beforeEach(async () => {
      server = new EmbeddingServer({ socketPath: manager.socketPath, backend: new LiteBackend(resolveModel('lite')) });
      await server.start();
    });

    afterEach(async () => {
      await server.stop();
    });

    it('should report its status', async () => {
      const status = await manager.status();
      expect(status.running).toBe(true);
      expect(status.model).toBe('lite');
      expect(status.pid).toBe(process.pid);
    });

    it('should not start a second server', async () => {
      const result = await manager.start('minilm');
      expect(result).toEqual({
        started: false,
        model: 'lite',
        dimensions: 384,
        pid: process.pid,
        requested: 'minilm',
        restartRequired: true
      });
    });

    it('should ask for a restart when the model changes', async () => {
      expect(await manager.setModel('minilm')).toEqual({
        model: 'minilm',
        running: true,
        current: 'lite',
        restartRequired: true
      });
    });

    it('should stop it over the socket', async () => {
      expect(await manager.stop()).toBe(true);
      expect((await manager.status()).running).toBe(false);
    });
  });

  it('should refuse a socket held by something else', async () => {
    const sockets: Socket[] = [];
    const squatter = createServer(socket => {
      sockets.push(socket);
    });
    await new Promise<void>(resolve => squatter.listen(manager.socketPath, () => resolve()));

    try {
      await expect(manager.start('lite')).rejects.toBeInstanceOf(ServerStartFailureError);
    } finally {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>(resolve => squatter.close(() => resolve()));
    }
  });
});
