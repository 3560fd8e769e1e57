/**
 * Config Validator - checks a merged configuration object
 *
 * Validation builds the typed configuration from the raw JSON value, so
 * nothing downstream ever sees an unchecked field.
 */

import { OptAssertError } from '../errors.js';

import type { OptAssertConfig, SourcesConfig, TypoConfig } from './types.js';

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * A single configuration validation error
 */
export interface ConfigValidationError {
  /** Path to the invalid field (e.g. 'typos.maxDistance') */
  path: string;
  message: string;
  /** Expected value or type */
  expected?: string | undefined;
  /** Actual value received */
  actual?: unknown;
}

/**
 * Result of a configuration validation
 */
export interface ConfigValidationResult {
  valid: boolean;
  /** Validated configuration (only present if valid) */
  data?: OptAssertConfig | undefined;
  /** Validation errors (only present if invalid) */
  errors?: ConfigValidationError[] | undefined;
}

/**
 * Thrown when a configuration fails validation
 */
export class ConfigValidationException extends OptAssertError {
  public readonly errors: ConfigValidationError[];

  constructor(message: string, errors: ConfigValidationError[]) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigValidationException';
    this.errors = errors;
  }

  /**
   * Format errors as one indented line per field
   */
  formatErrors(): string {
    if (this.errors.length === 0) {return 'No errors';}

    return this.errors
      .map((e) => {
        let msg = `  - ${e.path}: ${e.message}`;
        if (e.expected) {msg += ` (expected ${e.expected}`;}
        if (e.expected && e.actual !== undefined) {msg += `, got ${JSON.stringify(e.actual)}`;}
        if (e.expected) {msg += ')';}
        return msg;
      })
      .join('\n');
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function requireObject(
  value: unknown,
  path: string,
  errors: ConfigValidationError[]
): Record<string, unknown> | null {
  if (isObject(value)) {return value;}
  errors.push({ path, message: 'Must be an object', expected: 'object', actual: value });
  return null;
}

function requireSuffix(value: unknown, path: string, errors: ConfigValidationError[]): string {
  if (typeof value === 'string' && value.length > 0) {return value;}
  errors.push({ path, message: 'Must be a non-empty file name suffix', expected: 'non-empty string', actual: value });
  return '';
}

function requireCount(value: unknown, path: string, errors: ConfigValidationError[]): number {
  if (isNonNegativeInteger(value)) {return value;}
  errors.push({ path, message: 'Must be a non-negative integer', expected: 'integer >= 0', actual: value });
  return 0;
}

// ============================================================================
// Component Validators
// ============================================================================

function validateSources(value: unknown, errors: ConfigValidationError[]): SourcesConfig {
  const sources = requireObject(value, 'sources', errors) ?? {};
  const excludeDirs: string[] = [];
  const rawExcludeDirs = sources['excludeDirs'];

  if (!Array.isArray(rawExcludeDirs)) {
    errors.push({
      path: 'sources.excludeDirs',
      message: 'Must be an array of directory names',
      expected: 'string[]',
      actual: rawExcludeDirs,
    });
  } else {
    rawExcludeDirs.forEach((dir: unknown, i) => {
      if (typeof dir === 'string' && dir.length > 0) {
        excludeDirs.push(dir);
      } else {
        errors.push({
          path: `sources.excludeDirs[${i}]`,
          message: 'Directory name cannot be empty',
          expected: 'non-empty string',
          actual: dir,
        });
      }
    });
  }

  return {
    suffix: requireSuffix(sources['suffix'], 'sources.suffix', errors),
    testSuffix: requireSuffix(sources['testSuffix'], 'sources.testSuffix', errors),
    excludeDirs,
  };
}

function validateTypos(value: unknown, errors: ConfigValidationError[]): TypoConfig {
  const typos = requireObject(value, 'typos', errors) ?? {};
  return {
    maxCommentLength: requireCount(typos['maxCommentLength'], 'typos.maxCommentLength', errors),
    maxDistance: requireCount(typos['maxDistance'], 'typos.maxDistance', errors),
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate a complete (already merged with defaults) configuration value
 */
export function validateConfig(value: unknown): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];
  const root = requireObject(value, '', errors);
  if (!root) {
    return { valid: false, errors };
  }

  const sources = validateSources(root['sources'], errors);
  const typos = validateTypos(root['typos'], errors);
  const failOnViolation = root['failOnViolation'];
  if (typeof failOnViolation !== 'boolean') {
    errors.push({
      path: 'failOnViolation',
      message: 'Must be a boolean',
      expected: 'true | false',
      actual: failOnViolation,
    });
  }

  if (errors.length > 0 || typeof failOnViolation !== 'boolean') {
    return { valid: false, errors };
  }
  return { valid: true, data: { sources, typos, failOnViolation } };
}

/**
 * Validate and return the typed configuration
 *
 * @throws ConfigValidationException listing every invalid field
 */
export function assertValidConfig(value: unknown): OptAssertConfig {
  const result = validateConfig(value);
  if (!result.valid || !result.data) {
    const errors = result.errors ?? [];
    throw new ConfigValidationException(
      `Invalid configuration: ${errors.length} error(s) in ${errors.map((e) => e.path || '<root>').join(', ')}`,
      errors
    );
  }
  return result.data;
}
