import * as fs from 'node:fs';

/**
 * Split text into physical lines.
 *
 * Lines end at `\n`; a trailing `\r` is dropped. A final newline does not
 * start an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Read a UTF-8 document in one call. The descriptor is released before this
 * returns, whether or not the read succeeds.
 */
export function readDocument(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}
