/**
 * Annotation Scanner Tests
 *
 * Covers line splitting, annotation matching priority, the typo heuristic
 * and scanning a directory tree.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  matchAnnotation,
  scanAnnotations,
  scanSourceText,
  splitCodeAndComment,
} from './annotation-scanner.js';
import { createMemoryLogger } from '../logging/logger.js';
import type { SourceWalker } from './source-walker.js';

const MAIN_GO = `
package main

func main() {
	var a int //no-escape
	var b int //no-bounds-check
	var c int //must-inline
}
`;

describe('splitCodeAndComment', () => {
  it('splits at the first marker and trims both parts', () => {
    expect(splitCodeAndComment('\tx := f() // a // b  ')).toEqual({ code: 'x := f()', comment: '// a // b' });
  });

  it('returns an empty comment when there is no marker', () => {
    expect(splitCodeAndComment('  x := 1  ')).toEqual({ code: 'x := 1', comment: '' });
  });

  it('returns empty code for comment-only lines', () => {
    expect(splitCodeAndComment('   //no-escape')).toEqual({ code: '', comment: '//no-escape' });
  });
});

describe('matchAnnotation', () => {
  it('requires the token right after the marker', () => {
    expect(matchAnnotation('//no-escape')).toBe('no-escape');
    expect(matchAnnotation('// no-escape')).toBeNull();
  });

  it('keeps the first annotation in priority order', () => {
    expect(matchAnnotation('//must-inline //no-escape')).toBe('no-escape');
    expect(matchAnnotation('//must-inline //no-bounds-check')).toBe('no-bounds-check');
  });

  it('matches tokens followed by more text', () => {
    expect(matchAnnotation('//must-inline because hot path')).toBe('must-inline');
  });
});

describe('scanSourceText', () => {
  it('records one annotation per annotated line', () => {
    const result = scanSourceText(MAIN_GO, 'main.go');

    expect(result.annotations.toJSON()).toEqual({
      'main.go:5': ['no-escape'],
      'main.go:6': ['no-bounds-check'],
      'main.go:7': ['must-inline'],
    });
    expect(result.valid).toBe(true);
    expect(result.typos).toEqual([]);
  });

  it('ignores annotations without code on the same line', () => {
    const result = scanSourceText('//no-escape\n\tx := 1\n\t//must-inline\n', 'a.go');

    expect(result.annotations.size).toBe(0);
    expect(result.valid).toBe(true);
  });

  it('canonicalizes the file path of positions', () => {
    const result = scanSourceText('x := 1 //no-escape\n', './pkg/../pkg/a.go');
    expect(result.annotations.positions()).toEqual([{ file: 'pkg/a.go', line: 1 }]);
  });

  it('reports a near-miss comment as a typo without recording it', () => {
    const logger = createMemoryLogger();
    const result = scanSourceText('package main\n\nvar x int //no-escap\n', 'main.go', { logger });

    expect(result.annotations.size).toBe(0);
    expect(result.valid).toBe(false);
    expect(result.typos).toEqual([
      { position: { file: 'main.go', line: 3 }, comment: '//no-escap', candidates: ['no-escape'] },
    ]);
    expect(logger.messages('warn')).toEqual(["probably a typo '//no-escap' at main.go:3"]);
  });

  it('treats a space after the marker as a typo', () => {
    const result = scanSourceText('y := add(a, b) // must-inline\n', 'main.go');

    expect(result.valid).toBe(false);
    expect(result.typos.map((typo) => typo.candidates)).toEqual([['must-inline']]);
  });

  it('skips long comments and unrelated short ones', () => {
    const result = scanSourceText(
      'x := 1 //nolint\ny := 2 //TODO\nz := 3 //no-escap but this comment is far too long\n',
      'main.go'
    );

    expect(result.valid).toBe(true);
    expect(result.typos).toEqual([]);
  });

  it('respects custom typo thresholds', () => {
    const strict = scanSourceText('x := 1 //no-escap\n', 'main.go', { maxDistance: 2 });
    const short = scanSourceText('x := 1 //no-escap\n', 'main.go', { maxCommentLength: 5 });

    expect(strict.valid).toBe(true);
    expect(short.valid).toBe(true);
  });

  it('measures comment length in code points', () => {
    // 17 code points, 18 UTF-8 bytes
    const result = scanSourceText('x := a[i] //no-bounds-ch\u00e9ck\n', 'main.go', { maxCommentLength: 17 });

    expect(result.typos.map((typo) => typo.candidates)).toEqual([['no-bounds-check']]);
  });

  it('keeps scanning after a typo', () => {
    const result = scanSourceText('a := 1 //no-escap\nb := 2 //no-escape\n', 'main.go');

    expect(result.valid).toBe(false);
    expect(result.annotations.toJSON()).toEqual({ 'main.go:2': ['no-escape'] });
  });
});

describe('scanAnnotations', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'optassert-scan-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('scans every eligible file of the tree', () => {
    const mainGo = path.join(tmpDir, 'main.go');
    fs.writeFileSync(mainGo, MAIN_GO);
    fs.writeFileSync(path.join(tmpDir, 'main_test.go'), 'var t int //no-escape\n');
    fs.mkdirSync(path.join(tmpDir, 'vendor'));
    fs.writeFileSync(path.join(tmpDir, 'vendor', 'dep.go'), 'var d int //no-escap\n');

    const result = scanAnnotations(tmpDir);

    expect(result.annotations.toJSON()).toEqual({
      [`${mainGo}:5`]: ['no-escape'],
      [`${mainGo}:6`]: ['no-bounds-check'],
      [`${mainGo}:7`]: ['must-inline'],
    });
    expect(result.valid).toBe(true);
  });

  it('reports typos from any file while still collecting annotations', () => {
    fs.writeFileSync(path.join(tmpDir, 'a.go'), 'var a int //no-escap\n');
    fs.writeFileSync(path.join(tmpDir, 'b.go'), 'var b int //no-escape\n');
    const logger = createMemoryLogger();

    const result = scanAnnotations(tmpDir, { logger });

    expect(result.valid).toBe(false);
    expect(result.annotations.positions()).toEqual([{ file: path.join(tmpDir, 'b.go'), line: 1 }]);
    expect(logger.messages('warn')).toEqual([
      `probably a typo '//no-escap' at ${path.join(tmpDir, 'a.go')}:1`,
    ]);
  });

  it('reads the files an injected walker visits', () => {
    const filePath = path.join(tmpDir, 'anything.txt');
    fs.writeFileSync(filePath, 'x := f() //must-inline\n');
    const walker: SourceWalker = {
      visit: (_root, visitor) => visitor(filePath),
    };

    const result = scanAnnotations('/ignored', { walker });

    expect(result.annotations.get({ file: filePath, line: 1 })).toEqual(['must-inline']);
  });

  it('is idempotent over unchanged inputs', () => {
    fs.writeFileSync(path.join(tmpDir, 'main.go'), MAIN_GO);
    const first = scanAnnotations(tmpDir);
    const second = scanAnnotations(tmpDir);

    expect(JSON.stringify(second.annotations)).toBe(JSON.stringify(first.annotations));
    expect(second.valid).toBe(first.valid);
  });
});
