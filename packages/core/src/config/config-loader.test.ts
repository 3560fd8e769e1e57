/**
 * Config Loader and Validator Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigLoader, CONFIG_DIR, CONFIG_FILE } from './config-loader.js';
import { ConfigValidationException, validateConfig } from './config-validator.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigLoadError } from '../errors.js';

describe('ConfigLoader', () => {
  let tmpDir: string;

  function writeConfig(content: string): string {
    const configPath = path.join(tmpDir, CONFIG_DIR, CONFIG_FILE);
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, content);
    return configPath;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'optassert-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns the defaults when no config file exists', () => {
    const result = new ConfigLoader({ rootDir: tmpDir, env: {} }).load();

    expect(result.config).toEqual(DEFAULT_CONFIG);
    expect(result.configFileFound).toBe(false);
    expect(result.configPath).toBeUndefined();
    expect(result.envOverridesApplied).toBe(false);
  });

  it('merges a partial config file over the defaults', () => {
    const configPath = writeConfig(JSON.stringify({ typos: { maxDistance: 1 }, failOnViolation: false }));

    const result = new ConfigLoader({ rootDir: tmpDir, env: {} }).load();

    expect(result.configPath).toBe(configPath);
    expect(result.config).toEqual({
      sources: { suffix: '.go', testSuffix: '_test.go', excludeDirs: ['vendor'] },
      typos: { maxCommentLength: 20, maxDistance: 1 },
      failOnViolation: false,
    });
  });

  it('replaces arrays instead of merging them', () => {
    writeConfig(JSON.stringify({ sources: { excludeDirs: ['third_party', 'testdata'] } }));

    const { config } = new ConfigLoader({ rootDir: tmpDir, env: {} }).load();

    expect(config.sources.excludeDirs).toEqual(['third_party', 'testdata']);
    expect(config.sources.suffix).toBe('.go');
  });

  it('applies environment overrides and ignores unparseable values', () => {
    const result = new ConfigLoader({
      rootDir: tmpDir,
      env: {
        OPTASSERT_FAIL_ON_VIOLATION: 'no',
        OPTASSERT_TYPO_MAX_DISTANCE: '2',
        OPTASSERT_TYPO_MAX_COMMENT_LENGTH: 'lots',
      },
    }).load();

    expect(result.envOverridesApplied).toBe(true);
    expect(result.config.failOnViolation).toBe(false);
    expect(result.config.typos).toEqual({ maxCommentLength: 20, maxDistance: 2 });
  });

  it('skips environment overrides when disabled', () => {
    const result = new ConfigLoader({
      rootDir: tmpDir,
      applyEnvOverrides: false,
      env: { OPTASSERT_FAIL_ON_VIOLATION: 'false' },
    }).load();

    expect(result.config.failOnViolation).toBe(true);
  });

  it('requires an explicit config path to exist', () => {
    const loader = new ConfigLoader({ configPath: path.join(tmpDir, 'missing.json'), env: {} });
    expect(() => loader.load()).toThrow(ConfigLoadError);
  });

  it('rejects malformed JSON and non-object documents', () => {
    writeConfig('{ "typos": ');
    expect(() => new ConfigLoader({ rootDir: tmpDir, env: {} }).load()).toThrow(ConfigLoadError);

    writeConfig('[1, 2]');
    expect(() => new ConfigLoader({ rootDir: tmpDir, env: {} }).load()).toThrow(
      'Configuration must be a JSON object'
    );
  });

  it('rejects invalid values with every failing field', () => {
    writeConfig(JSON.stringify({ typos: { maxDistance: -1 }, sources: { suffix: '' } }));

    try {
      new ConfigLoader({ rootDir: tmpDir, env: {} }).load();
      expect.unreachable('load should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationException);
      if (error instanceof ConfigValidationException) {
        expect(error.errors.map((e) => e.path)).toEqual(['sources.suffix', 'typos.maxDistance']);
        expect(error.code).toBe('CONFIG_INVALID');
      }
    }
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, data: DEFAULT_CONFIG });
  });

  it('rejects a non-object', () => {
    const result = validateConfig('yes');
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
  });

  it('reports type errors per field', () => {
    const result = validateConfig({
      sources: { suffix: '.go', testSuffix: '_test.go', excludeDirs: ['vendor', 3] },
      typos: { maxCommentLength: 2.5, maxDistance: 3 },
      failOnViolation: 'yes',
    });

    expect(result.valid).toBe(false);
    expect(result.errors?.map((e) => e.path)).toEqual([
      'sources.excludeDirs[1]',
      'typos.maxCommentLength',
      'failOnViolation',
    ]);
  });

  it('formats errors one per line', () => {
    const exception = new ConfigValidationException('Invalid configuration', [
      { path: 'typos.maxDistance', message: 'Must be a non-negative integer', expected: 'integer >= 0', actual: -1 },
    ]);

    expect(exception.formatErrors()).toBe(
      '  - typos.maxDistance: Must be a non-negative integer (expected integer >= 0, got -1)'
    );
  });
});
