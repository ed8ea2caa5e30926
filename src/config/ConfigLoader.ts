/**
 * Configuration Loader
 *
 * Loads and saves the two YAML configuration files:
 * - `<store>/_config.yaml`: provider, model alias and vector dimensionality of one store
 * - `<configHome>/config.yaml`: user-global settings (model the embedding daemon loads)
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { getConfigHome } from '../core/config.js';
import { InvalidConfigError, getErrorMessage } from '../core/errors.js';
import type { StoreSettings } from '../core/types.js';

export const STORE_CONFIG_VERSION = 1;
export const DEFAULT_SERVER_MODEL = 'nomic';
export const GLOBAL_CONFIG_FILE = 'config.yaml';

const StoreSettingsSchema = z.object({
  version: z.number().int().positive().default(STORE_CONFIG_VERSION),
  provider: z.enum(['lite', 'server']).default('lite'),
  model: z.string().min(1).default('lite'),
  dimensions: z.number().int().positive().default(384)
});

const GlobalSettingsSchema = z.object({
  serverModel: z.string().min(1).default(DEFAULT_SERVER_MODEL)
});

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>;

export function defaultStoreSettings(): StoreSettings {
  return StoreSettingsSchema.parse({});
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function readYamlFile(path: string): unknown {
  const content = readFileSync(path, 'utf-8');
  try {
    return YAML.parse(content) ?? {};
  } catch (error) {
    throw new InvalidConfigError(path, `malformed YAML: ${getErrorMessage(error)}`, { cause: error });
  }
}

function writeYamlFile(path: string, header: string, data: object): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp-${process.pid}`;
  writeFileSync(tmp, `# ${header}\n${YAML.stringify(data)}`, 'utf-8');
  renameSync(tmp, path);
}

/**
 * Read `<store>/_config.yaml`. A missing file yields the defaults.
 */
export function loadStoreSettings(configPath: string): StoreSettings {
  if (!existsSync(configPath)) {
    return defaultStoreSettings();
  }
  const parsed = StoreSettingsSchema.safeParse(readYamlFile(configPath));
  if (!parsed.success) {
    throw new InvalidConfigError(configPath, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function saveStoreSettings(configPath: string, settings: StoreSettings): void {
  writeYamlFile(configPath, 'Knowledge store settings', {
    version: settings.version,
    provider: settings.provider,
    model: settings.model,
    dimensions: settings.dimensions
  });
}

export function getGlobalConfigPath(): string {
  return join(getConfigHome(), GLOBAL_CONFIG_FILE);
}

export function loadGlobalSettings(path: string = getGlobalConfigPath()): GlobalSettings {
  if (!existsSync(path)) {
    return GlobalSettingsSchema.parse({});
  }
  const parsed = GlobalSettingsSchema.safeParse(readYamlFile(path));
  // An unreadable global file falls back to defaults rather than blocking the daemon
  return parsed.success ? parsed.data : GlobalSettingsSchema.parse({});
}

export function saveGlobalSettings(settings: GlobalSettings, path: string = getGlobalConfigPath()): void {
  writeYamlFile(path, 'Knowledge base user settings', settings);
}
