/**
 * Configuration types
 */

/**
 * Which files the annotation scan visits
 */
export interface SourcesConfig {
  /** Suffix of source files */
  suffix: string;
  /** Suffix of test files, skipped even though they carry the source suffix */
  testSuffix: string;
  /** Directory names skipped with their subtree (hidden directories always are) */
  excludeDirs: string[];
}

/**
 * Thresholds of the misspelled-annotation heuristic
 */
export interface TypoConfig {
  /** Longest comment, in code points, checked for typos */
  maxCommentLength: number;
  /** Largest edit distance to an annotation name reported as a typo */
  maxDistance: number;
}

export interface OptAssertConfig {
  sources: SourcesConfig;
  typos: TypoConfig;
  /** Whether violations and typos make the run fail */
  failOnViolation: boolean;
}
