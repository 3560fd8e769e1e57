/**
 * optassert-core
 *
 * Checks performance annotations in source code against the optimization
 * decisions a compiler reports.
 */

// Types
export * from './types/index.js';
export type { Position } from './position/position.js';
export { canonicalizePath, canonicalizeFile, createPosition, positionKey, comparePositions } from './position/position.js';
export { PositionIndex, type PositionEntry, type ReadonlyPositionIndex } from './position/position-index.js';

// Errors
export {
  OptAssertError,
  CompilerOutputReadError,
  CompilerOutputParseError,
  SourceScanError,
  ConfigLoadError,
  describeCause,
  type OptAssertErrorCode,
} from './errors.js';

// Logging
export {
  createMemoryLogger,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
  type MemoryLogger,
} from './logging/logger.js';

// Matching
export { levenshteinDistance, closestMatches } from './matcher/edit-distance.js';

// Extraction
export {
  parseCompilerOutput,
  parseCompilerOutputText,
  classifyDiagnosticLine,
} from './parsers/compiler-output-parser.js';
export {
  createSourceWalker,
  DEFAULT_SOURCE_SUFFIX,
  DEFAULT_TEST_SUFFIX,
  DEFAULT_EXCLUDE_DIRS,
  type SourceWalker,
  type SourceWalkerOptions,
} from './scanner/source-walker.js';
export {
  scanAnnotations,
  scanSourceText,
  splitCodeAndComment,
  matchAnnotation,
  DEFAULT_MAX_COMMENT_LENGTH,
  DEFAULT_MAX_TYPO_DISTANCE,
  type AnnotationScannerOptions,
  type AnnotationScanResult,
  type TypoDetectionOptions,
} from './scanner/annotation-scanner.js';

// Reconciliation
export { reconcile, checkAnnotation, type ReconcileResult } from './reconciler/reconciler.js';
export { runCheck, type CheckOptions, type CheckResult } from './check/checker.js';

// Configuration
export {
  ConfigLoader,
  CONFIG_DIR,
  CONFIG_FILE,
  ENV_VARS,
  type ConfigLoaderOptions,
  type ConfigLoadResult,
} from './config/config-loader.js';
export {
  validateConfig,
  assertValidConfig,
  ConfigValidationException,
  type ConfigValidationError,
  type ConfigValidationResult,
} from './config/config-validator.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export type { OptAssertConfig, SourcesConfig, TypoConfig } from './config/types.js';
