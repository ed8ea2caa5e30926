/**
 * Embedding daemon entry point.
 *
 * Spawned detached by ServerManager. Loads one model, serves it on the runtime
 * socket and removes its socket and pid files on SIGTERM/SIGINT or /shutdown.
 */

import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { Command } from 'commander';
import 'dotenv/config';
import { getRuntimeDir } from '../core/config.js';
import { getErrorMessage } from '../core/errors.js';
import { loadGlobalSettings } from '../config/ConfigLoader.js';
import { createLogger } from '../utils/logger.js';
import { socketPathFor } from './EmbeddingClient.js';
import { EmbeddingServer } from './EmbeddingServer.js';
import { createBackend } from './ModelBackend.js';
import { resolveModel } from './models.js';
import { PID_FILE } from './protocol.js';

const log = createLogger('Daemon');

interface DaemonOptions {
  model?: string;
  runtimeDir: string;
}

async function main(): Promise<void> {
  const program = new Command('arbor-embedder')
    .option('--model <alias>', 'Model alias to load')
    .option('--runtime-dir <dir>', 'Directory for socket, pid and log files', getRuntimeDir())
    .parse(process.argv);

  const options = program.opts<DaemonOptions>();
  const spec = resolveModel(options.model ?? loadGlobalSettings().serverModel);

  log.info(`Loading model ${spec.alias} (${spec.model}, ${spec.dimensions} dimensions)`);
  const backend = createBackend(spec);
  await backend.load();

  mkdirSync(options.runtimeDir, { recursive: true, mode: 0o700 });
  const socketPath = socketPathFor(options.runtimeDir);
  const pidPath = join(options.runtimeDir, PID_FILE);

  let exiting = false;
  const exit = (code: number): void => {
    if (exiting) return;
    exiting = true;
    rmSync(pidPath, { force: true });
    log.info('Exiting');
    process.exit(code);
  };

  const server = new EmbeddingServer({ socketPath, backend, onShutdown: () => exit(0) });
  await server.start();
  writeFileSync(pidPath, String(process.pid));

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info(`Received ${signal}, shutting down`);
    void server
      .stop()
      .catch(error => log.error('Shutdown failed:', getErrorMessage(error)))
      .finally(() => exit(0));
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  log.info(`Ready on ${socketPath} (pid ${process.pid})`);
}

main().catch(error => {
  log.error('Failed to start:', getErrorMessage(error));
  process.exit(1);
});
