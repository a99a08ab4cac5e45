/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, existsSync } from 'fs';
import YAML from 'js-yaml';
import { describeError, isLogLevel, logger } from './logger.js';
import type { LogLevel } from './logger.js';
import { isMergeScope } from './types.js';
import type { MergeScope } from './types.js';

export interface MergeConfig {
  scope: MergeScope;
}

export interface OutputConfig {
  dedupeSuffix: string;
  flattenSuffix: string;
}

export interface AppConfig {
  merge: MergeConfig;
  output: OutputConfig;
  /** Falls back to LOG_LEVEL, then info */
  logLevel?: LogLevel;
}

export const DEFAULT_CONFIG_PATH = './bookmark-tidy.yaml';

export const CONFIG_PATH_ENV = 'BOOKMARK_TIDY_CONFIG';

export const DEFAULT_CONFIG: AppConfig = {
  merge: {
    scope: 'sibling'
  },
  output: {
    dedupeSuffix: '.dedup',
    flattenSuffix: '.flat'
  }
};

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private loadErrors: string[] = [];

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.debug(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      // An empty YAML document loads as undefined
      if (parsed === undefined || parsed === null) {
        return cloneConfig(DEFAULT_CONFIG);
      }
      if (!isRecord(parsed)) {
        throw new Error('Configuration must be a mapping');
      }

      // Merge with defaults
      return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), parsed);
    } catch (error) {
      this.loadErrors.push(`Failed to load config: ${describeError(error)}`);
      logger.warn(
        `Failed to load config: ${describeError(error)}`,
        undefined,
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Merge user config with defaults (user config takes precedence).
   * Values of the wrong type are recorded and reported by validate().
   */
  private mergeConfigs(defaults: AppConfig, user: Record<string, unknown>): AppConfig {
    const merged = defaults;

    for (const [key, value] of Object.entries(user)) {
      if (value === null || value === undefined) continue;

      switch (key) {
        case 'merge':
          if (!isRecord(value)) {
            this.loadErrors.push('merge must be a mapping');
          } else if (value.scope !== undefined) {
            if (isMergeScope(value.scope)) {
              merged.merge.scope = value.scope;
            } else {
              this.loadErrors.push(`merge.scope must be "sibling" or "global", got ${JSON.stringify(value.scope)}`);
            }
          }
          break;
        case 'output':
          if (!isRecord(value)) {
            this.loadErrors.push('output must be a mapping');
            break;
          }
          for (const field of ['dedupeSuffix', 'flattenSuffix'] as const) {
            const suffix = value[field];
            if (suffix === undefined) continue;
            if (typeof suffix === 'string') {
              merged.output[field] = suffix;
            } else {
              this.loadErrors.push(`output.${field} must be a string`);
            }
          }
          break;
        case 'logLevel':
          if (isLogLevel(value)) {
            merged.logLevel = value;
          } else {
            this.loadErrors.push(`logLevel must be one of debug, info, warn, error, got ${JSON.stringify(value)}`);
          }
          break;
        default:
          logger.warn(`Ignoring unknown config key: ${key}`, undefined, 'ConfigManager');
      }
    }

    return merged;
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors = [...this.loadErrors];

    for (const field of ['dedupeSuffix', 'flattenSuffix'] as const) {
      const suffix = this.config.output[field];
      if (!/^\.[^/\\]+$/.test(suffix)) {
        errors.push(`output.${field} must start with "." and contain no path separators, got ${JSON.stringify(suffix)}`);
      }
    }

    if (this.config.output.dedupeSuffix === this.config.output.flattenSuffix) {
      errors.push('output.dedupeSuffix and output.flattenSuffix must differ');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config);
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

/**
 * Config path from an explicit option, the environment, or the default
 */
export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  return explicitPath ?? env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH;
}
