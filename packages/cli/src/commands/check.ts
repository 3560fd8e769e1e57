/**
 * optassert check — compare annotations with compiler diagnostics
 *
 * Exit codes: 0 = clean (or failing disabled), 1 = violations or typos, 2 = error.
 */

import {
  ConfigLoadError,
  ConfigLoader,
  ConfigValidationException,
  CompilerOutputParseError,
  CompilerOutputReadError,
  SourceScanError,
  describeCause,
  runCheck,
  type Logger,
} from 'optassert-core';

export const EXIT_OK = 0;
export const EXIT_VIOLATIONS = 1;
export const EXIT_ERROR = 2;

export interface CheckCommandOptions {
  /** Diagnostic document */
  file?: string | undefined;
  /** Source root */
  pkg: string;
  /** False when --no-fail was given */
  fail: boolean;
  /** Explicit config file */
  config?: string | undefined;
  verbose?: boolean | undefined;
}

/**
 * Prefix naming the stage a fatal error came from
 */
function describeFailure(error: unknown): string {
  if (error instanceof CompilerOutputReadError || error instanceof CompilerOutputParseError) {
    return `error parsing compiler output: ${error.message}`;
  }
  if (error instanceof SourceScanError) {
    return `error parsing source code: ${error.message}`;
  }
  if (error instanceof ConfigValidationException) {
    return `error loading config: ${error.message}\n${error.formatErrors()}`;
  }
  if (error instanceof ConfigLoadError) {
    return `error loading config ${error.filePath}: ${error.message}`;
  }
  return `error: ${describeCause(error)}`;
}

/**
 * Run one check and return the exit code. Expects `options.file` to be set.
 */
export function executeCheck(options: CheckCommandOptions & { file: string }, logger: Logger): number {
  try {
    const { config, configPath } = new ConfigLoader({
      rootDir: options.pkg,
      configPath: options.config,
    }).load();
    if (configPath) {
      logger.debug(`using config ${configPath}`);
    }

    const result = runCheck({
      compilerOutputPath: options.file,
      sourceRoot: options.pkg,
      config,
      logger,
    });

    if (result.valid) {
      logger.debug('all annotations hold');
      return EXIT_OK;
    }

    const shouldFail = options.fail && config.failOnViolation;
    logger.debug(
      `${result.violations.length} violation(s), ${result.typos.length} probable typo(s)` +
        (shouldFail ? '' : ', not failing')
    );
    return shouldFail ? EXIT_VIOLATIONS : EXIT_OK;
  } catch (error) {
    for (const line of describeFailure(error).split('\n')) {
      logger.error(line);
    }
    return EXIT_ERROR;
  }
}
