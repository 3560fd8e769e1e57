import {
  DEFAULT_EXCLUDE_DIRS,
  DEFAULT_SOURCE_SUFFIX,
  DEFAULT_TEST_SUFFIX,
} from '../scanner/source-walker.js';
import {
  DEFAULT_MAX_COMMENT_LENGTH,
  DEFAULT_MAX_TYPO_DISTANCE,
} from '../scanner/annotation-scanner.js';

import type { OptAssertConfig } from './types.js';

export const DEFAULT_CONFIG: OptAssertConfig = {
  sources: {
    suffix: DEFAULT_SOURCE_SUFFIX,
    testSuffix: DEFAULT_TEST_SUFFIX,
    excludeDirs: [...DEFAULT_EXCLUDE_DIRS],
  },
  typos: {
    maxCommentLength: DEFAULT_MAX_COMMENT_LENGTH,
    maxDistance: DEFAULT_MAX_TYPO_DISTANCE,
  },
  failOnViolation: true,
};
