/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InvalidConfigError } from '../core/errors.js';
import { findStorePath, getDefaultConfig, mergeConfig, validateConfig } from '../core/config.js';
import {
  defaultStoreSettings,
  loadGlobalSettings,
  loadStoreSettings,
  saveGlobalSettings,
  saveStoreSettings
} from './ConfigLoader.js';

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-config-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('store settings', () => {
    it('should default to the lite provider when no file exists', () => {
      expect(loadStoreSettings(join(dir, '_config.yaml'))).toEqual({
        version: 1,
        provider: 'lite',
        model: 'lite',
        dimensions: 384
      });
      expect(defaultStoreSettings().provider).toBe('lite');
    });

    it('should save and load settings as YAML', () => {
      const path = join(dir, '_config.yaml');
      saveStoreSettings(path, { version: 1, provider: 'server', model: 'nomic', dimensions: 768 });

      expect(readFileSync(path, 'utf-8')).toContain('provider: server');
      expect(loadStoreSettings(path)).toEqual({ version: 1, provider: 'server', model: 'nomic', dimensions: 768 });
    });

    it('should reject malformed or invalid files', () => {
      const path = join(dir, '_config.yaml');

      writeFileSync(path, 'provider: [unclosed\n');
      expect(() => loadStoreSettings(path)).toThrow(InvalidConfigError);

      writeFileSync(path, 'provider: cloud\n');
      expect(() => loadStoreSettings(path)).toThrow(InvalidConfigError);

      writeFileSync(path, 'dimensions: -3\n');
      expect(() => loadStoreSettings(path)).toThrow(InvalidConfigError);
    });
  });

  describe('global settings', () => {
    it('should fall back to defaults when the file is missing or unreadable', () => {
      const path = join(dir, 'config.yaml');
      expect(loadGlobalSettings(path)).toEqual({ serverModel: 'nomic' });

      writeFileSync(path, 'serverModel: 7\n');
      expect(loadGlobalSettings(path)).toEqual({ serverModel: 'nomic' });
    });

    it('should round-trip the server model', () => {
      const path = join(dir, 'nested', 'config.yaml');
      saveGlobalSettings({ serverModel: 'minilm' }, path);
      expect(loadGlobalSettings(path)).toEqual({ serverModel: 'minilm' });
    });
  });

  describe('store location', () => {
    it('should prefer ARBOR_PATH', () => {
      vi.stubEnv('ARBOR_PATH', join(dir, 'elsewhere'));
      expect(findStorePath(dir)).toBe(join(dir, 'elsewhere'));
    });

    it('should find .arbor in a parent directory', () => {
      vi.stubEnv('ARBOR_PATH', '');
      mkdirSync(join(dir, '.arbor'));
      mkdirSync(join(dir, 'a', 'b'), { recursive: true });

      expect(findStorePath(join(dir, 'a', 'b'))).toBe(join(dir, '.arbor'));
    });

    it('should re-derive file locations when the store moves', () => {
      const base = getDefaultConfig(join(dir, 'one'));
      const moved = mergeConfig(base, { storePath: join(dir, 'two') });

      expect(moved.indexPath).toBe(join(dir, 'two', '_index.db'));
      expect(moved.configPath).toBe(join(dir, 'two', '_config.yaml'));
      expect(moved.searchConfig).toEqual(base.searchConfig);
    });

    it('should report invalid values', () => {
      const config = getDefaultConfig(dir);
      const errors = validateConfig({ ...config, searchConfig: { ...config.searchConfig, defaultLimit: 0 } });
      expect(errors).toEqual(['searchConfig.defaultLimit must be at least 1']);
    });
  });
});
