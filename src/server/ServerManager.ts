/**
 * ServerManager
 *
 * Lifecycle of the embedding daemon: one process per user, found through a
 * socket, pid file and log in the runtime directory.
 *
 * Detection order mirrors a health check first, then the pid file:
 * a responsive socket wins; a pid without a responsive socket is treated as a
 * hung daemon; neither means not running.
 */

import { execFileSync, spawn } from 'child_process';
import { closeSync, existsSync, mkdirSync, openSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { connect } from 'net';
import { basename, join } from 'path';
import { fileURLToPath } from 'url';
import {
  KnowledgeBaseError,
  ServerStartFailureError,
  getErrorMessage
} from '../core/errors.js';
import { loadGlobalSettings, saveGlobalSettings, getGlobalConfigPath } from '../config/ConfigLoader.js';
import { createLogger } from '../utils/logger.js';
import { isProcessRunning, readPidFile, sleep } from '../utils/process.js';
import { EmbeddingClient, socketPathFor } from './EmbeddingClient.js';
import { MODEL_REGISTRY, resolveModel, type ModelSpec } from './models.js';
import { LOG_FILE, PID_FILE } from './protocol.js';

const log = createLogger('ServerManager');

const POLL_INTERVAL_MS = 200;
const STOP_GRACE_MS = 5000;
const LOG_TAIL_LINES = 5;

export interface ServerManagerOptions {
  runtimeDir: string;
  pingTimeoutMs?: number;
  requestTimeoutMs?: number;
  startTimeoutMs?: number;
  /** Location of the user-global config.yaml holding serverModel */
  globalConfigPath?: string;
  /** Script the daemon runs; defaults to daemon.js (or .ts under a TS loader) beside this module */
  daemonScript?: string;
}

export interface ServerStatus {
  running: boolean;
  model?: string;
  dimensions?: number;
  pid?: number;
  startedAt?: string;
  queueDepth?: number;
  socketPath: string;
  /** Alias the daemon loads on its next start */
  configuredModel: string;
}

export interface StartResult {
  /** False when a responsive daemon was already running */
  started: boolean;
  model: string;
  dimensions: number;
  pid: number;
  requested: string;
  /** The running daemon has another model than the requested one */
  restartRequired: boolean;
}

export interface SetModelResult {
  model: string;
  running: boolean;
  current?: string;
  restartRequired: boolean;
}

type SocketState = 'absent' | 'stale' | 'busy';

function defaultDaemonScript(): string {
  const here = fileURLToPath(import.meta.url);
  const ext = here.endsWith('.ts') ? '.ts' : '.js';
  return join(here, '..', `daemon${ext}`);
}

/**
 * Whether a process command line is the embedding daemon for `runtimeDir`
 */
export function isDaemonCommand(command: string, daemonScript: string, runtimeDir: string): boolean {
  const args = command.trim().split(/\s+/);
  const dirAt = args.indexOf('--runtime-dir');
  return args.some(arg => basename(arg) === basename(daemonScript)) && dirAt >= 0 && args[dirAt + 1] === runtimeDir;
}

/**
 * Command line of a live process, or null when it cannot be read
 */
function processCommand(pid: number): string | null {
  try {
    return execFileSync('ps', ['-ww', '-p', String(pid), '-o', 'command='], { encoding: 'utf-8' }).trim() || null;
  } catch (error) {
    log.debug(`Could not read the command of pid ${pid}:`, getErrorMessage(error));
    return null;
  }
}

/**
 * Whether something accepts connections on the socket path
 */
function checkSocket(socketPath: string, timeoutMs: number): Promise<SocketState> {
  if (!existsSync(socketPath)) return Promise.resolve('absent');

  return new Promise(resolve => {
    const socket = connect(socketPath);
    const timer = setTimeout(() => {
      socket.destroy();
      resolve('busy');
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timer);
      socket.destroy();
      resolve('busy');
    });
    socket.once('error', () => {
      clearTimeout(timer);
      resolve('stale');
    });
  });
}

export class ServerManager {
  readonly socketPath: string;
  readonly pidPath: string;
  readonly logPath: string;
  private readonly runtimeDir: string;
  private readonly startTimeoutMs: number;
  private readonly pingTimeoutMs: number;
  private readonly globalConfigPath: string;
  private readonly daemonScript: string;
  private readonly client: EmbeddingClient;

  constructor(options: ServerManagerOptions) {
    this.runtimeDir = options.runtimeDir;
    this.socketPath = socketPathFor(options.runtimeDir);
    this.pidPath = join(options.runtimeDir, PID_FILE);
    this.logPath = join(options.runtimeDir, LOG_FILE);
    this.startTimeoutMs = options.startTimeoutMs ?? 60000;
    this.pingTimeoutMs = options.pingTimeoutMs ?? 500;
    this.globalConfigPath = options.globalConfigPath ?? getGlobalConfigPath();
    this.daemonScript = options.daemonScript ?? defaultDaemonScript();
    this.client = new EmbeddingClient({
      socketPath: this.socketPath,
      pingTimeoutMs: this.pingTimeoutMs,
      requestTimeoutMs: options.requestTimeoutMs ?? 30000
    });
  }

  /**
   * Alias the daemon loads when started without one
   */
  configuredModel(): string {
    return loadGlobalSettings(this.globalConfigPath).serverModel;
  }

  models(): readonly ModelSpec[] {
    return MODEL_REGISTRY;
  }

  async status(): Promise<ServerStatus> {
    const configuredModel = this.configuredModel();
    try {
      const remote = await this.client.status();
      return {
        running: true,
        model: remote.model,
        dimensions: remote.dimensions,
        pid: remote.pid,
        startedAt: remote.startedAt,
        queueDepth: remote.queueDepth,
        socketPath: this.socketPath,
        configuredModel
      };
    } catch (error) {
      if (!(error instanceof KnowledgeBaseError)) throw error;
      return { running: false, socketPath: this.socketPath, configuredModel };
    }
  }

  /**
   * Start the daemon unless a responsive one already exists.
   *
   * @throws {InvalidModelError} If the alias is unknown
   * @throws {ServerStartFailureError} If the socket is held by something else,
   *   the model cannot be loaded, or the daemon does not answer in time
   */
  async start(alias?: string): Promise<StartResult> {
    const requested = resolveModel(alias ?? this.configuredModel());

    const current = await this.status();
    if (current.running && current.model && current.dimensions !== undefined && current.pid !== undefined) {
      return {
        started: false,
        model: current.model,
        dimensions: current.dimensions,
        pid: current.pid,
        requested: requested.alias,
        restartRequired: current.model !== requested.alias
      };
    }

    const socketState = await checkSocket(this.socketPath, this.pingTimeoutMs);
    if (socketState === 'busy') {
      throw new ServerStartFailureError(`${this.socketPath} is held by a process that does not answer the embedding protocol`);
    }
    if (socketState === 'stale') {
      log.info(`Removing stale socket ${this.socketPath}`);
      rmSync(this.socketPath, { force: true });
    }

    const stalePid = readPidFile(this.pidPath);
    if (stalePid !== null && !isProcessRunning(stalePid)) {
      rmSync(this.pidPath, { force: true });
    }

    return this.spawnDaemon(requested);
  }

  /**
   * Stop the daemon. Idempotent. Only a pid the daemon reported over its
   * socket, or one whose command line is this runtime's daemon, is ever
   * signalled; any other pid file is stale and just removed.
   *
   * @returns true if a daemon was running
   */
  async stop(): Promise<boolean> {
    const current = await this.status();
    let signalled = false;

    if (current.running) {
      try {
        await this.client.shutdown();
      } catch (error) {
        log.warn('Shutdown request failed, signalling instead:', getErrorMessage(error));
      }
      if (!(await this.waitForSilence(STOP_GRACE_MS)) && current.pid !== undefined) {
        signalled = await this.terminate(current.pid);
      }
    } else {
      const hung = this.hungDaemonPid();
      if (hung !== null) {
        log.warn(`Daemon pid ${hung} does not answer, signalling it`);
        signalled = await this.terminate(hung);
      }
    }

    const socketState = await checkSocket(this.socketPath, this.pingTimeoutMs);
    if (socketState !== 'busy') {
      rmSync(this.socketPath, { force: true });
    }
    rmSync(this.pidPath, { force: true });
    return current.running || signalled;
  }

  async restart(alias?: string): Promise<StartResult> {
    await this.stop();
    return this.start(alias);
  }

  /**
   * Select the model the daemon loads. A running daemon is never hot-swapped;
   * the result says whether a restart is needed.
   *
   * @throws {InvalidModelError}
   */
  async setModel(alias: string): Promise<SetModelResult> {
    const spec = resolveModel(alias);
    saveGlobalSettings({ serverModel: spec.alias }, this.globalConfigPath);

    const current = await this.status();
    if (!current.running) {
      return { model: spec.alias, running: false, restartRequired: false };
    }

    const response = await this.client.setModel(spec.alias);
    return {
      model: spec.alias,
      running: true,
      current: response.current,
      restartRequired: response.restartRequired
    };
  }

  // ==========================================
  // INTERNALS
  // ==========================================

  private async spawnDaemon(spec: ModelSpec): Promise<StartResult> {
    mkdirSync(this.runtimeDir, { recursive: true, mode: 0o700 });
    const logFd = openSync(this.logPath, 'a');

    const daemon: { exited: boolean; code: number | null } = { exited: false, code: null };

    try {
      const child = spawn(
        process.execPath,
        [...process.execArgv, this.daemonScript, '--model', spec.alias, '--runtime-dir', this.runtimeDir],
        {
          detached: true,
          stdio: ['ignore', logFd, logFd],
          env: { ...process.env, ARBOR_DEBUG: process.env.ARBOR_DEBUG ?? '1' }
        }
      );

      child.on('exit', code => {
        daemon.exited = true;
        daemon.code = code;
      });
      child.on('error', error => {
        daemon.exited = true;
        log.error('Failed to spawn daemon:', getErrorMessage(error));
      });
      child.unref();

      if (child.pid !== undefined) {
        writeFileSync(this.pidPath, String(child.pid));
      }

      const deadline = Date.now() + this.startTimeoutMs;
      while (Date.now() < deadline) {
        if (daemon.exited) {
          rmSync(this.pidPath, { force: true });
          throw new ServerStartFailureError(
            `daemon exited with code ${String(daemon.code)}: ${this.logTail() || 'no output'}`
          );
        }

        try {
          const status = await this.client.status();
          return {
            started: true,
            model: status.model,
            dimensions: status.dimensions,
            pid: status.pid,
            requested: spec.alias,
            restartRequired: status.model !== spec.alias
          };
        } catch (error) {
          if (!(error instanceof KnowledgeBaseError)) throw error;
        }
        await sleep(POLL_INTERVAL_MS);
      }

      if (child.pid !== undefined && isProcessRunning(child.pid)) {
        process.kill(child.pid, 'SIGTERM');
      }
      rmSync(this.pidPath, { force: true });
      throw new ServerStartFailureError(`daemon did not answer within ${this.startTimeoutMs}ms (see ${this.logPath})`);
    } finally {
      closeSync(logFd);
    }
  }

  /**
   * Pid from the pid file when it belongs to a live daemon of this runtime
   * directory that no longer answers on the socket
   */
  private hungDaemonPid(): number | null {
    const pid = readPidFile(this.pidPath);
    if (pid === null || pid === process.pid || !isProcessRunning(pid)) return null;

    const command = processCommand(pid);
    if (command === null || !isDaemonCommand(command, this.daemonScript, this.runtimeDir)) {
      log.warn(`Ignoring stale pid file: pid ${pid} is not an embedding daemon`);
      return null;
    }
    return pid;
  }

  /**
   * SIGTERM, then SIGKILL after the grace period. Resolves to whether a
   * signal was sent.
   */
  private async terminate(pid: number): Promise<boolean> {
    if (pid === process.pid || !isProcessRunning(pid)) return false;
    process.kill(pid, 'SIGTERM');
    if (!(await this.waitForExit(pid, STOP_GRACE_MS))) {
      process.kill(pid, 'SIGKILL');
    }
    return true;
  }

  /**
   * Wait until the socket stops answering
   */
  private async waitForSilence(timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (!(await this.client.ping())) return true;
      await sleep(POLL_INTERVAL_MS);
    }
    return !(await this.client.ping());
  }

  private async waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (!isProcessRunning(pid)) return true;
      await sleep(POLL_INTERVAL_MS);
    }
    return !isProcessRunning(pid);
  }

  private logTail(): string {
    if (!existsSync(this.logPath)) return '';
    const lines = readFileSync(this.logPath, 'utf-8').trimEnd().split('\n');
    return lines.slice(-LOG_TAIL_LINES).join(' | ');
  }
}
