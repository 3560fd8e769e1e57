/**
 * Compiler Output Parser - diagnostic text to position-keyed hints
 *
 * Recognizes the escape analysis, inlining and bounds check lines a compiler
 * prints, e.g.
 *
 *   ./main.go:10:6: moved to heap: buf
 *   ./main.go:14:13: inlining call to add
 *   ./main.go:20:9: Found IsInBounds
 *
 * Everything else in the document is ignored.
 */

import * as path from 'node:path';

import { CompilerOutputParseError, CompilerOutputReadError } from '../errors.js';
import { PositionIndex } from '../position/position-index.js';
import { canonicalizePath, createPosition } from '../position/position.js';
import { HINT_PATTERNS, type CompilerHint, type HintIndex } from '../types/index.js';
import { readDocument, splitLines } from '../utils/lines.js';

/** Signed decimal integer, as accepted for the line field */
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Classify a diagnostic line. Returns the first hint, in priority order,
 * whose substring the line contains.
 */
export function classifyDiagnosticLine(line: string): CompilerHint | null {
  for (const [substring, hint] of HINT_PATTERNS) {
    if (line.includes(substring)) {
      return hint;
    }
  }
  return null;
}

/**
 * Parse diagnostic text. Relative file references resolve against `baseDir`.
 *
 * @param source - Name of the document, used in error messages
 * @throws CompilerOutputParseError when a recognized line has a non-integer or out-of-range line field
 */
export function parseCompilerOutputText(text: string, baseDir: string, source = '<input>'): HintIndex {
  const index = new PositionIndex<CompilerHint>();
  const lines = splitLines(text);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const hint = classifyDiagnosticLine(line);
    if (!hint) {continue;}

    const [location] = line.trim().split(/\s+/);
    if (!location) {continue;}

    const fields = location.split(':');
    if (fields.length < 2) {continue;}

    const [file = '', lineField = ''] = fields;
    const lineNumber = INTEGER_PATTERN.test(lineField) ? parseInt(lineField, 10) : NaN;
    // Out-of-range values would round onto another line's key
    if (!Number.isSafeInteger(lineNumber)) {
      throw new CompilerOutputParseError(source, i + 1, lineField);
    }

    index.add(createPosition(canonicalizePath(baseDir, file), lineNumber), hint);
  }

  return index;
}

/**
 * Parse a diagnostic document. File references inside it resolve against the
 * document's own directory.
 *
 * @throws CompilerOutputReadError when the document cannot be read
 * @throws CompilerOutputParseError when a recognized line has a non-integer or out-of-range line field
 */
export function parseCompilerOutput(filePath: string): HintIndex {
  let text: string;
  try {
    text = readDocument(filePath);
  } catch (error) {
    throw new CompilerOutputReadError(filePath, error);
  }
  return parseCompilerOutputText(text, path.dirname(filePath), filePath);
}
