/**
 * Source Walker - visits the eligible source files under a root
 *
 * Skips hidden and excluded directories, keeps files with the source suffix
 * and drops test files. The annotation scanner receives a walker instead of
 * touching the directory tree itself.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { SourceScanError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export interface SourceWalkerOptions {
  /** Suffix of files to visit */
  sourceSuffix?: string | undefined;
  /** Suffix of files to skip even though they carry the source suffix */
  testSuffix?: string | undefined;
  /** Directory names skipped with their subtree, in addition to hidden ones */
  excludeDirs?: readonly string[] | undefined;
}

/**
 * Capability to visit every eligible file under a root, one at a time.
 */
export interface SourceWalker {
  /**
   * Call `visitor` for each eligible file, depth first in name order.
   *
   * @throws SourceScanError on any filesystem failure
   */
  visit(root: string, visitor: (filePath: string) => void): void;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SOURCE_SUFFIX = '.go';
export const DEFAULT_TEST_SUFFIX = '_test.go';
export const DEFAULT_EXCLUDE_DIRS: readonly string[] = ['vendor'];

// ============================================================================
// Implementation
// ============================================================================

class DirectorySourceWalker implements SourceWalker {
  private readonly sourceSuffix: string;
  private readonly testSuffix: string;
  private readonly excludeDirs: ReadonlySet<string>;

  constructor(options: SourceWalkerOptions) {
    this.sourceSuffix = options.sourceSuffix ?? DEFAULT_SOURCE_SUFFIX;
    this.testSuffix = options.testSuffix ?? DEFAULT_TEST_SUFFIX;
    this.excludeDirs = new Set(options.excludeDirs ?? DEFAULT_EXCLUDE_DIRS);
  }

  visit(root: string, visitor: (filePath: string) => void): void {
    let stats: fs.Stats;
    try {
      stats = fs.lstatSync(root);
    } catch (error) {
      throw new SourceScanError(root, error);
    }

    // The root is entered whatever its name
    if (stats.isDirectory()) {
      this.walkDirectory(root, visitor);
    } else if (this.isEligibleFile(path.basename(root))) {
      visitor(root);
    }
  }

  isEligibleFile(name: string): boolean {
    return name.endsWith(this.sourceSuffix) && !name.endsWith(this.testSuffix);
  }

  isSkippedDirectory(name: string): boolean {
    return name.startsWith('.') || this.excludeDirs.has(name);
  }

  private walkDirectory(dir: string, visitor: (filePath: string) => void): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      throw new SourceScanError(dir, error);
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (!this.isSkippedDirectory(entry.name)) {
          this.walkDirectory(fullPath, visitor);
        }
      } else if (this.isEligibleFile(entry.name)) {
        visitor(fullPath);
      }
    }
  }
}

/**
 * Create a walker over the local filesystem
 */
export function createSourceWalker(options: SourceWalkerOptions = {}): SourceWalker {
  return new DirectorySourceWalker(options);
}
