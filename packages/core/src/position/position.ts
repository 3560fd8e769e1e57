/**
 * Source positions shared by diagnostics and annotations
 */

import * as path from 'node:path';

/**
 * A (file, line) pair. `file` is canonical, `line` is 1-based.
 */
export interface Position {
  readonly file: string;
  readonly line: number;
}

/**
 * Join a file reference onto the directory of the document that mentions it
 * and collapse `.`/`..` segments and duplicate separators.
 *
 * The second argument is appended even when it is absolute, so both sides of
 * a comparison must be resolved against consistent base directories.
 */
export function canonicalizePath(baseDir: string, file: string): string {
  return path.join(baseDir, file);
}

/**
 * Canonical form of a path produced by a directory walk
 */
export function canonicalizeFile(file: string): string {
  return path.normalize(file);
}

export function createPosition(file: string, line: number): Position {
  return { file, line };
}

/**
 * Map key for a position. Two positions share a key iff they are equal.
 */
export function positionKey(position: Position): string {
  return `${position.file}:${position.line}`;
}

/**
 * Order positions by file, then by line.
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.file !== b.file) {
    return a.file < b.file ? -1 : 1;
  }
  return a.line - b.line;
}
