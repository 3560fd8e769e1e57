/**
 * Annotation Scanner - source tree to position-keyed annotations
 *
 * An annotation is a trailing same-line comment written right after the
 * marker, on a line that also has code:
 *
 *   buf := make([]byte, 64) //no-escape
 *   x := data[i]            //no-bounds-check
 *   y := add(a, b)          //must-inline
 *
 * Short comments that are close to an annotation name are reported as
 * probable typos, so a misspelled annotation never goes unchecked.
 */

import { closestMatches } from '../matcher/edit-distance.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { PositionIndex } from '../position/position-index.js';
import { canonicalizeFile, createPosition, positionKey } from '../position/position.js';
import { SourceScanError } from '../errors.js';
import {
  ANNOTATIONS,
  COMMENT_MARKER,
  type Annotation,
  type AnnotationIndex,
  type TypoEntry,
} from '../types/index.js';
import { readDocument, splitLines } from '../utils/lines.js';
import { createSourceWalker, type SourceWalker, type SourceWalkerOptions } from './source-walker.js';

// ============================================================================
// Types
// ============================================================================

export interface TypoDetectionOptions {
  /** Longest trimmed comment, in code points, still checked for typos */
  maxCommentLength?: number | undefined;
  /** Largest edit distance still reported as a typo */
  maxDistance?: number | undefined;
}

export interface AnnotationScannerOptions extends SourceWalkerOptions, TypoDetectionOptions {
  /** File visitor; a filesystem walker built from the suffix options by default */
  walker?: SourceWalker | undefined;
  /** Receives typo warnings */
  logger?: Logger | undefined;
}

export interface AnnotationScanResult {
  annotations: AnnotationIndex;
  typos: TypoEntry[];
  /** False when at least one probable typo was found */
  valid: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MAX_COMMENT_LENGTH = 20;
export const DEFAULT_MAX_TYPO_DISTANCE = 3;

const ANNOTATION_TOKENS: ReadonlyArray<readonly [token: string, annotation: Annotation]> =
  ANNOTATIONS.map((annotation) => [`${COMMENT_MARKER}${annotation}`, annotation] as const);

// ============================================================================
// Line Helpers
// ============================================================================

/**
 * Split a line at the first comment marker. Both parts are trimmed and the
 * comment keeps its marker.
 */
export function splitCodeAndComment(line: string): { code: string; comment: string } {
  const markerIndex = line.indexOf(COMMENT_MARKER);
  if (markerIndex === -1) {
    return { code: line.trim(), comment: '' };
  }
  return {
    code: line.slice(0, markerIndex).trim(),
    comment: line.slice(markerIndex).trim(),
  };
}

/**
 * First annotation, in priority order, whose token the comment contains.
 */
export function matchAnnotation(comment: string): Annotation | null {
  for (const [token, annotation] of ANNOTATION_TOKENS) {
    if (comment.includes(token)) {
      return annotation;
    }
  }
  return null;
}

// ============================================================================
// Scanner
// ============================================================================

/**
 * Accumulates annotations and typos across the files of one scan.
 */
class AnnotationCollector {
  readonly annotations = new PositionIndex<Annotation>();
  readonly typos: TypoEntry[] = [];
  private readonly maxCommentLength: number;
  private readonly maxDistance: number;

  constructor(options: TypoDetectionOptions, private readonly logger: Logger) {
    this.maxCommentLength = options.maxCommentLength ?? DEFAULT_MAX_COMMENT_LENGTH;
    this.maxDistance = options.maxDistance ?? DEFAULT_MAX_TYPO_DISTANCE;
  }

  collect(text: string, filePath: string): void {
    const file = canonicalizeFile(filePath);
    const lines = splitLines(text);

    for (let i = 0; i < lines.length; i++) {
      const { code, comment } = splitCodeAndComment(lines[i] ?? '');
      if (code === '' || comment === '') {continue;}

      const position = createPosition(file, i + 1);
      const annotation = matchAnnotation(comment);
      if (annotation) {
        this.annotations.add(position, annotation);
        continue;
      }

      if (Array.from(comment).length > this.maxCommentLength) {continue;}

      const candidates = closestMatches(comment, ANNOTATIONS, this.maxDistance);
      if (candidates.length > 0) {
        this.typos.push({ position, comment, candidates });
        this.logger.warn(`probably a typo '${comment}' at ${positionKey(position)}`);
      }
    }
  }

  result(): AnnotationScanResult {
    return {
      annotations: this.annotations,
      typos: this.typos,
      valid: this.typos.length === 0,
    };
  }
}

/**
 * Scan one in-memory document.
 */
export function scanSourceText(
  text: string,
  filePath: string,
  options: TypoDetectionOptions & { logger?: Logger | undefined } = {}
): AnnotationScanResult {
  const collector = new AnnotationCollector(options, options.logger ?? silentLogger);
  collector.collect(text, filePath);
  return collector.result();
}

/**
 * Scan every eligible source file under `root`.
 *
 * Typos are logged and clear `valid` but never stop the scan.
 *
 * @throws SourceScanError when the walk or a file read fails
 */
export function scanAnnotations(root: string, options: AnnotationScannerOptions = {}): AnnotationScanResult {
  const walker = options.walker ?? createSourceWalker(options);
  const collector = new AnnotationCollector(options, options.logger ?? silentLogger);

  walker.visit(root, (filePath) => {
    let text: string;
    try {
      text = readDocument(filePath);
    } catch (error) {
      throw new SourceScanError(filePath, error);
    }
    collector.collect(text, filePath);
  });

  return collector.result();
}
