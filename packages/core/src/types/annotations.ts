/**
 * Annotation and compiler hint vocabularies
 *
 * Annotations are the assertions a developer writes next to code.
 * Compiler hints are the facts recovered from the compiler's diagnostics.
 * Both are closed unions; their textual forms only matter at the parsing
 * boundary.
 */

// ============================================================================
// Annotations
// ============================================================================

/**
 * Known annotations, in the priority order the scanner checks them.
 */
export const ANNOTATIONS = ['no-escape', 'no-bounds-check', 'must-inline'] as const;

/**
 * An assertion of expected compiler behavior for one source line.
 *
 * - no-escape: the value declared on the line stays on the stack
 * - no-bounds-check: the index expression on the line has its bounds check eliminated
 * - must-inline: the call on the line is inlined
 */
export type Annotation = (typeof ANNOTATIONS)[number];

/** Comment marker that introduces an annotation, with no space after it */
export const COMMENT_MARKER = '//';

// ============================================================================
// Compiler Hints
// ============================================================================

export const COMPILER_HINTS = [
  'escapes-to-heap',
  'moved-to-heap',
  'stays-on-stack',
  'found-is-in-bounds',
  'inlined',
] as const;

/**
 * An optimization decision reported by the compiler for one source line.
 */
export type CompilerHint = (typeof COMPILER_HINTS)[number];

/**
 * Diagnostic substrings and the hint each one stands for, in priority order.
 * A line carries at most one hint: the first entry it contains.
 */
export const HINT_PATTERNS: ReadonlyArray<readonly [substring: string, hint: CompilerHint]> = [
  ['escapes to heap', 'escapes-to-heap'],
  ['moved to heap', 'moved-to-heap'],
  ['stays on stack', 'stays-on-stack'],
  ['inlining call', 'inlined'],
  ['Found IsInBounds', 'found-is-in-bounds'],
];
