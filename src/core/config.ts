/**
 * Configuration
 *
 * Default configuration and environment variable loading for the knowledge base.
 */

import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { homedir, tmpdir, userInfo } from 'os';
import type { KnowledgeBaseConfig } from './types.js';

/** Environment variable that designates an alternate store root */
export const STORE_PATH_ENV = 'ARBOR_PATH';
export const STORE_DIR_NAME = '.arbor';

export const INDEX_FILE = '_index.db';
export const CONFIG_FILE = '_config.yaml';
export const LOCK_FILE = '_lock';

/**
 * Find the store directory.
 *
 * Search order:
 * 1. ARBOR_PATH environment variable
 * 2. Walk up from the start directory looking for .arbor/
 * 3. Fall back to <start>/.arbor/
 */
export function findStorePath(fromDir: string = process.cwd()): string {
  const envPath = process.env[STORE_PATH_ENV];
  if (envPath && envPath.length > 0) {
    return resolve(envPath);
  }

  let dir = resolve(fromDir);
  while (true) {
    const candidate = join(dir, STORE_DIR_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break; // Reached filesystem root
    dir = parent;
  }

  return join(resolve(fromDir), STORE_DIR_NAME);
}

/**
 * Directory holding the embedding daemon's socket, pid file and log
 */
export function getRuntimeDir(): string {
  const override = process.env.ARBOR_RUNTIME_DIR;
  if (override && override.length > 0) {
    return resolve(override);
  }
  let user: string;
  try {
    user = String(userInfo().uid >= 0 ? userInfo().uid : userInfo().username);
  } catch {
    user = 'default';
  }
  return join(tmpdir(), `arbor-${user}`);
}

/**
 * Directory of the user-global configuration (server model selection)
 */
export function getConfigHome(): string {
  const override = process.env.ARBOR_CONFIG_HOME;
  if (override && override.length > 0) {
    return resolve(override);
  }
  return join(homedir(), '.config', 'arbor');
}

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getDefaultConfig(storePath?: string): KnowledgeBaseConfig {
  const root = storePath ? resolve(storePath) : findStorePath();

  return {
    storePath: root,
    indexPath: join(root, INDEX_FILE),
    configPath: join(root, CONFIG_FILE),
    lockPath: join(root, LOCK_FILE),
    autoRepair: process.env.ARBOR_AUTO_REPAIR !== 'false',
    searchConfig: {
      defaultLimit: envInt('ARBOR_SEARCH_LIMIT', 5),
      excerptLength: 200
    },
    serverConfig: {
      runtimeDir: getRuntimeDir(),
      pingTimeoutMs: envInt('ARBOR_PING_TIMEOUT_MS', 500),
      requestTimeoutMs: envInt('ARBOR_REQUEST_TIMEOUT_MS', 30000),
      startTimeoutMs: envInt('ARBOR_START_TIMEOUT_MS', 60000),
      retryIntervalMs: envInt('ARBOR_RETRY_INTERVAL_MS', 5000)
    }
  };
}

/**
 * Deep-merge overrides into a base configuration. A new storePath re-derives
 * the file locations that hang off it unless those are overridden too.
 */
export function mergeConfig(
  base: KnowledgeBaseConfig,
  overrides: Partial<KnowledgeBaseConfig>
): KnowledgeBaseConfig {
  const storePath = overrides.storePath ? resolve(overrides.storePath) : base.storePath;
  const moved = storePath !== base.storePath;

  return {
    storePath,
    indexPath: overrides.indexPath ?? (moved ? join(storePath, INDEX_FILE) : base.indexPath),
    configPath: overrides.configPath ?? (moved ? join(storePath, CONFIG_FILE) : base.configPath),
    lockPath: overrides.lockPath ?? (moved ? join(storePath, LOCK_FILE) : base.lockPath),
    autoRepair: overrides.autoRepair ?? base.autoRepair,
    searchConfig: { ...base.searchConfig, ...overrides.searchConfig },
    serverConfig: { ...base.serverConfig, ...overrides.serverConfig }
  };
}

export function validateConfig(config: KnowledgeBaseConfig): string[] {
  const errors: string[] = [];

  if (!config.storePath) {
    errors.push('storePath is required');
  }
  if (config.searchConfig.defaultLimit < 1) {
    errors.push('searchConfig.defaultLimit must be at least 1');
  }
  if (config.searchConfig.excerptLength < 1) {
    errors.push('searchConfig.excerptLength must be at least 1');
  }
  if (config.serverConfig.pingTimeoutMs <= 0) {
    errors.push('serverConfig.pingTimeoutMs must be positive');
  }
  if (config.serverConfig.requestTimeoutMs <= 0) {
    errors.push('serverConfig.requestTimeoutMs must be positive');
  }
  if (config.serverConfig.startTimeoutMs <= 0) {
    errors.push('serverConfig.startTimeoutMs must be positive');
  }
  if (config.serverConfig.retryIntervalMs < 0) {
    errors.push('serverConfig.retryIntervalMs must not be negative');
  }

  return errors;
}
