import type { MergeConfig } from './types.js';
import type { MergeOptions } from '../coordinator/types.js';
import { hostIsCaseSensitive } from '../utils/path-normalizer.js';

/**
 * Options used by the merge engine when a caller leaves them out
 */
export const defaultMergeOptions: MergeOptions = {
  policy: 'NeverOverwrite',
  concurrency: 4,
  preserveMetadata: false,
  followSymlinks: false,
  caseSensitive: hostIsCaseSensitive(),
  skipIdentical: false,
  dryRun: false,
  excludeDirs: []
};

/**
 * Default configuration values
 */
export const defaultConfig: MergeConfig = {
  sources: [],
  destination: null,
  merge: {
    policy: defaultMergeOptions.policy,
    concurrency: defaultMergeOptions.concurrency,
    preserveMetadata: false,
    followSymlinks: false,
    caseSensitive: null,
    skipIdentical: false,
    dryRun: false
  },
  filters: {
    excludeDirs: []
  },
  output: {
    format: 'text',
    outputFile: null,
    maxFailuresShown: 20,
    logFile: null
  }
};
