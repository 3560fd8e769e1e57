/**
 * Config Loader - Configuration loading and merging
 *
 * Loads configuration from .optassert/config.json (or an explicit path),
 * merges it over the defaults, applies environment variable overrides and
 * validates the result. A missing default config file is not an error.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { ConfigLoadError, describeCause } from '../errors.js';
import { assertValidConfig } from './config-validator.js';
import { DEFAULT_CONFIG } from './defaults.js';

import type { OptAssertConfig } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Directory holding the configuration */
export const CONFIG_DIR = '.optassert';

/** Config file name */
export const CONFIG_FILE = 'config.json';

/** Environment variable prefix for config overrides */
const ENV_PREFIX = 'OPTASSERT_';

export const ENV_VARS = {
  FAIL_ON_VIOLATION: `${ENV_PREFIX}FAIL_ON_VIOLATION`,
  TYPO_MAX_DISTANCE: `${ENV_PREFIX}TYPO_MAX_DISTANCE`,
  TYPO_MAX_COMMENT_LENGTH: `${ENV_PREFIX}TYPO_MAX_COMMENT_LENGTH`,
} as const;

// ============================================================================
// Helper Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source values overriding target values
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = target[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

function toRecord(config: OptAssertConfig): Record<string, unknown> {
  return {
    sources: { ...config.sources, excludeDirs: [...config.sources.excludeDirs] },
    typos: { ...config.typos },
    failOnViolation: config.failOnViolation,
  };
}

/**
 * Parse a boolean from an environment variable string
 */
function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {return undefined;}
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {return true;}
  if (lower === 'false' || lower === '0' || lower === 'no') {return false;}
  return undefined;
}

/**
 * Parse a non-negative integer from an environment variable string
 */
function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {return undefined;}
  return parseInt(value, 10);
}

// ============================================================================
// Config Loader Class
// ============================================================================

export interface ConfigLoaderOptions {
  /** Directory searched for .optassert/config.json */
  rootDir?: string | undefined;
  /** Explicit config file; must exist when given */
  configPath?: string | undefined;
  /** Whether to apply environment variable overrides */
  applyEnvOverrides?: boolean | undefined;
  /** Environment to read overrides from */
  env?: NodeJS.ProcessEnv | undefined;
}

export interface ConfigLoadResult {
  config: OptAssertConfig;
  /** Path to the config file (if one was read) */
  configPath?: string | undefined;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

/**
 * ConfigLoader - Loads and validates optassert configuration
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly explicitPath: boolean;
  private readonly applyEnvOverrides: boolean;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigLoaderOptions = {}) {
    const rootDir = options.rootDir ?? process.cwd();
    this.explicitPath = options.configPath !== undefined;
    this.configPath = options.configPath ?? path.join(rootDir, CONFIG_DIR, CONFIG_FILE);
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from file, merge with defaults, apply env overrides
   *
   * @throws ConfigLoadError when the file cannot be read or is not a JSON object
   * @throws ConfigValidationException when a value is invalid
   */
  load(): ConfigLoadResult {
    let merged = toRecord(DEFAULT_CONFIG);
    let configFileFound = false;

    if (this.explicitPath || fs.existsSync(this.configPath)) {
      merged = deepMerge(merged, this.loadFromFile(this.configPath));
      configFileFound = true;
    }

    let config = assertValidConfig(merged);
    let envOverridesApplied = false;

    if (this.applyEnvOverrides) {
      const overridden = this.withEnvOverrides(config);
      envOverridesApplied = overridden !== config;
      config = overridden;
    }

    return {
      config,
      configPath: configFileFound ? this.configPath : undefined,
      configFileFound,
      envOverridesApplied,
    };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private loadFromFile(filePath: string): Record<string, unknown> {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to read configuration file: ${describeCause(error)}`,
        filePath,
        error
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to parse configuration file: ${describeCause(error)}`,
        filePath,
        error
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigLoadError('Configuration must be a JSON object', filePath);
    }
    return parsed;
  }

  /**
   * Returns `config` itself when no override applies
   */
  private withEnvOverrides(config: OptAssertConfig): OptAssertConfig {
    const failOnViolation = parseEnvBoolean(this.env[ENV_VARS.FAIL_ON_VIOLATION]);
    const maxDistance = parseEnvInteger(this.env[ENV_VARS.TYPO_MAX_DISTANCE]);
    const maxCommentLength = parseEnvInteger(this.env[ENV_VARS.TYPO_MAX_COMMENT_LENGTH]);

    if (failOnViolation === undefined && maxDistance === undefined && maxCommentLength === undefined) {
      return config;
    }

    return {
      sources: config.sources,
      typos: {
        maxCommentLength: maxCommentLength ?? config.typos.maxCommentLength,
        maxDistance: maxDistance ?? config.typos.maxDistance,
      },
      failOnViolation: failOnViolation ?? config.failOnViolation,
    };
  }
}
