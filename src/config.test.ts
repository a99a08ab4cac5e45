import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import YAML from 'js-yaml';
import {
  CONFIG_PATH_ENV,
  ConfigManager,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  resolveConfigPath,
} from './config.js';
import { logger } from './logger.js';

describe('ConfigManager', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'bookmark-config-'));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  const writeConfig = (name: string, content: string): string => {
    const path = join(configDir, name);
    writeFileSync(path, content);
    return path;
  };

  describe('Initialization', () => {
    it('should use defaults when the file does not exist', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));

      expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
      expect(manager.validate()).toEqual({ valid: true, errors: [] });
    });

    it('should use defaults for an empty YAML file', () => {
      const manager = new ConfigManager(writeConfig('empty.yaml', ''));

      expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
      expect(manager.validate().valid).toBe(true);
    });

    it('should return a copy of the configuration', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));

      manager.getAll().merge.scope = 'global';

      expect(manager.getAll().merge.scope).toBe('sibling');
      expect(DEFAULT_CONFIG.merge.scope).toBe('sibling');
    });
  });

  describe('JSON Configuration', () => {
    it('should merge JSON values over the defaults', () => {
      const path = writeConfig(
        'config.json',
        JSON.stringify({ merge: { scope: 'global' }, output: { dedupeSuffix: '.clean' } })
      );

      const config = new ConfigManager(path).getAll();

      expect(config.merge.scope).toBe('global');
      expect(config.output).toEqual({ dedupeSuffix: '.clean', flattenSuffix: '.flat' });
    });

    it('should report a parse failure through validate', () => {
      const manager = new ConfigManager(writeConfig('broken.json', '{ "merge": '));

      const result = manager.validate();

      expect(result.valid).toBe(false);
      expect(result.errors[0]).toMatch(/^Failed to load config: /);
    });
  });

  describe('YAML Configuration', () => {
    it('should load YAML values', () => {
      const path = writeConfig('config.yaml', 'merge:\n  scope: global\nlogLevel: debug\n');

      const config = new ConfigManager(path).getAll();

      expect(config.merge.scope).toBe('global');
      expect(config.logLevel).toBe('debug');
    });

    it('should accept the .yml extension', () => {
      const path = writeConfig('config.yml', 'output:\n  flattenSuffix: ".flattened"\n');

      expect(new ConfigManager(path).getAll().output.flattenSuffix).toBe('.flattened');
    });

    it('should reject unsupported formats', () => {
      const manager = new ConfigManager(writeConfig('config.toml', 'scope = "global"'));

      expect(manager.validate().errors).toEqual([
        `Failed to load config: Unsupported config format: ${join(configDir, 'config.toml')}`,
      ]);
    });

    it('should round-trip through toYAML', () => {
      const path = writeConfig('config.yaml', 'merge:\n  scope: global\n');
      const manager = new ConfigManager(path);

      expect(YAML.load(manager.toYAML())).toEqual(manager.getAll());
    });
  });

  describe('Validation', () => {
    it('should reject an unknown merge scope', () => {
      const manager = new ConfigManager(writeConfig('config.json', JSON.stringify({ merge: { scope: 'everywhere' } })));

      expect(manager.validate()).toEqual({
        valid: false,
        errors: ['merge.scope must be "sibling" or "global", got "everywhere"'],
      });
      expect(manager.getAll().merge.scope).toBe('sibling');
    });

    it('should reject a suffix without a leading dot', () => {
      const manager = new ConfigManager(writeConfig('config.json', JSON.stringify({ output: { dedupeSuffix: 'dedup' } })));

      expect(manager.validate().errors).toEqual([
        'output.dedupeSuffix must start with "." and contain no path separators, got "dedup"',
      ]);
    });

    it('should reject identical suffixes', () => {
      const path = writeConfig('config.json', JSON.stringify({ output: { dedupeSuffix: '.x', flattenSuffix: '.x' } }));

      expect(new ConfigManager(path).validate().errors).toEqual([
        'output.dedupeSuffix and output.flattenSuffix must differ',
      ]);
    });

    it('should reject values of the wrong type', () => {
      const path = writeConfig('config.json', JSON.stringify({ merge: 'global', logLevel: 'loud' }));

      expect(new ConfigManager(path).validate().errors).toEqual([
        'merge must be a mapping',
        'logLevel must be one of debug, info, warn, error, got "loud"',
      ]);
    });

    it('should warn about unknown keys without failing', () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      const manager = new ConfigManager(writeConfig('config.json', JSON.stringify({ extra: true })));

      expect(manager.validate().valid).toBe(true);
      expect(warn).toHaveBeenCalledWith('Ignoring unknown config key: extra', undefined, 'ConfigManager');
    });
  });

  describe('resolveConfigPath', () => {
    it('should prefer the explicit path, then the environment', () => {
      expect(resolveConfigPath('mine.yaml', { [CONFIG_PATH_ENV]: 'env.yaml' })).toBe('mine.yaml');
      expect(resolveConfigPath(undefined, { [CONFIG_PATH_ENV]: 'env.yaml' })).toBe('env.yaml');
      expect(resolveConfigPath(undefined, {})).toBe(DEFAULT_CONFIG_PATH);
    });
  });
});
