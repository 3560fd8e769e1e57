/**
 * Error classes
 *
 * Every error that aborts a run extends OptAssertError and carries a stable
 * code the CLI maps to its exit status.
 */

export type OptAssertErrorCode =
  | 'COMPILER_OUTPUT_READ'
  | 'COMPILER_OUTPUT_PARSE'
  | 'SOURCE_SCAN'
  | 'CONFIG_LOAD'
  | 'CONFIG_INVALID';

/**
 * Base class for fatal errors
 */
export class OptAssertError extends Error {
  public readonly code: OptAssertErrorCode;

  constructor(code: OptAssertErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'OptAssertError';
    this.code = code;
  }
}

/**
 * Thrown when the diagnostic document cannot be read
 */
export class CompilerOutputReadError extends OptAssertError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super('COMPILER_OUTPUT_READ', `failed to open file: ${describeCause(cause)}`, cause);
    this.name = 'CompilerOutputReadError';
    this.filePath = filePath;
  }
}

/**
 * Thrown when a recognized diagnostic line has a non-integer line number
 */
export class CompilerOutputParseError extends OptAssertError {
  public readonly filePath: string;
  /** 1-based ordinal of the offending line in the diagnostic document */
  public readonly lineNumber: number;
  /** The field that failed to parse */
  public readonly token: string;

  constructor(filePath: string, lineNumber: number, token: string) {
    super(
      'COMPILER_OUTPUT_PARSE',
      `failed to parse line number at ${lineNumber}: invalid integer '${token}'`
    );
    this.name = 'CompilerOutputParseError';
    this.filePath = filePath;
    this.lineNumber = lineNumber;
    this.token = token;
  }
}

/**
 * Thrown when walking or reading the source tree fails
 */
export class SourceScanError extends OptAssertError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('SOURCE_SCAN', `failed to read ${path}: ${describeCause(cause)}`, cause);
    this.name = 'SourceScanError';
    this.path = path;
  }
}

/**
 * Thrown when a configuration file cannot be read or is not a JSON object
 */
export class ConfigLoadError extends OptAssertError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super('CONFIG_LOAD', message, cause);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
  }
}

/**
 * Render an unknown thrown value as a message fragment
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}
