/**
 * Checker - one complete run
 *
 * Parses the diagnostic document, scans the source tree and reconciles the
 * two. The extractors share nothing; either may fail the run with a fatal
 * error before reconciliation starts.
 */

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { parseCompilerOutput } from '../parsers/compiler-output-parser.js';
import { reconcile } from '../reconciler/reconciler.js';
import { scanAnnotations } from '../scanner/annotation-scanner.js';

import type { OptAssertConfig } from '../config/types.js';
import type { SourceWalker } from '../scanner/source-walker.js';
import type { AnnotationIndex, HintIndex, TypoEntry, Violation } from '../types/index.js';

export interface CheckOptions {
  /** Diagnostic document written by the compiler */
  compilerOutputPath: string;
  /** Root of the source tree */
  sourceRoot: string;
  config?: OptAssertConfig | undefined;
  logger?: Logger | undefined;
  /** Replaces the filesystem walker built from `config.sources` */
  walker?: SourceWalker | undefined;
}

export interface CheckResult {
  hints: HintIndex;
  annotations: AnnotationIndex;
  typos: TypoEntry[];
  /** False when the scan found a probable typo */
  annotationsValid: boolean;
  violations: Violation[];
  /** True when there are neither typos nor violations */
  valid: boolean;
}

/**
 * Run both extractors and the reconciler.
 *
 * @throws CompilerOutputReadError, CompilerOutputParseError, SourceScanError
 */
export function runCheck(options: CheckOptions): CheckResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? silentLogger;

  const hints = parseCompilerOutput(options.compilerOutputPath);
  logger.debug(`parsed ${hints.size} hinted position(s) from ${options.compilerOutputPath}`);

  const scan = scanAnnotations(options.sourceRoot, {
    walker: options.walker,
    logger,
    sourceSuffix: config.sources.suffix,
    testSuffix: config.sources.testSuffix,
    excludeDirs: config.sources.excludeDirs,
    maxCommentLength: config.typos.maxCommentLength,
    maxDistance: config.typos.maxDistance,
  });
  logger.debug(`found ${scan.annotations.size} annotated position(s) under ${options.sourceRoot}`);

  const { valid, violations } = reconcile(hints, scan.annotations, logger);

  return {
    hints,
    annotations: scan.annotations,
    typos: scan.typos,
    annotationsValid: scan.valid,
    violations,
    valid: scan.valid && valid,
  };
}
