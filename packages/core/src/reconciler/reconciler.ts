/**
 * Reconciler - checks annotations against compiler hints
 *
 * Annotations are assertions and hints are evidence. Only annotated
 * positions are inspected; a hint with no annotation is never reported.
 */

import { silentLogger, type Logger } from '../logging/logger.js';
import { positionKey, type Position } from '../position/position.js';
import type {
  Annotation,
  AnnotationIndex,
  CompilerHint,
  HintIndex,
  Violation,
} from '../types/index.js';

export interface ReconcileResult {
  /** False when any annotation is violated */
  valid: boolean;
  /** One entry per violated annotation, ordered by position */
  violations: Violation[];
}

/**
 * Rule for one annotation: when it is violated and how to say so.
 */
interface AnnotationRule {
  isViolated(hints: readonly CompilerHint[]): boolean;
  describe(position: Position): string;
}

const RULES: Record<Annotation, AnnotationRule> = {
  'no-escape': {
    isViolated: (hints) => hints.includes('escapes-to-heap') || hints.includes('moved-to-heap'),
    describe: (position) =>
      `variable at ${positionKey(position)} is marked as no-escape but escapes to heap`,
  },
  'no-bounds-check': {
    isViolated: (hints) => hints.includes('found-is-in-bounds'),
    describe: (position) =>
      `variable at ${positionKey(position)} is marked as no-bounds-check but bounds check is not eliminated`,
  },
  'must-inline': {
    isViolated: (hints) => !hints.includes('inlined'),
    describe: (position) =>
      `function at ${positionKey(position)} is marked as must-inline but is not inlined`,
  },
};

/**
 * Check a single annotation against the hints at its position.
 */
export function checkAnnotation(
  annotation: Annotation,
  position: Position,
  hints: readonly CompilerHint[]
): Violation | null {
  const rule = RULES[annotation];
  if (!rule.isViolated(hints)) {
    return null;
  }
  return { position, annotation, hints, message: rule.describe(position) };
}

/**
 * Apply every annotation's rule. Each violation is logged as an error.
 */
export function reconcile(
  hints: HintIndex,
  annotations: AnnotationIndex,
  logger: Logger = silentLogger
): ReconcileResult {
  const violations: Violation[] = [];

  for (const { position, values } of annotations.entries()) {
    const observed = hints.get(position);

    for (const annotation of values) {
      const violation = checkAnnotation(annotation, position, observed);
      if (violation) {
        logger.error(violation.message);
        violations.push(violation);
      }
    }
  }

  return { valid: violations.length === 0, violations };
}
