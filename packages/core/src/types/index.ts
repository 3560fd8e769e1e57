/**
 * Shared types
 */

import type { ReadonlyPositionIndex } from '../position/position-index.js';
import type { Position } from '../position/position.js';
import type { Annotation, CompilerHint } from './annotations.js';

export * from './annotations.js';

/** Position -> hints recovered from one diagnostic document */
export type HintIndex = ReadonlyPositionIndex<CompilerHint>;

/** Position -> annotations recovered from one source tree */
export type AnnotationIndex = ReadonlyPositionIndex<Annotation>;

/**
 * A comment that looks like a misspelled annotation
 */
export interface TypoEntry {
  position: Position;
  /** Trimmed comment text, marker included */
  comment: string;
  /** Annotations within the edit distance threshold */
  candidates: Annotation[];
}

/**
 * An annotation the compiler output contradicts
 */
export interface Violation {
  position: Position;
  annotation: Annotation;
  /** Hints observed at the position */
  hints: readonly CompilerHint[];
  message: string;
}
