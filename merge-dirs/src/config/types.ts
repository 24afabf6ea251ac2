import type { ConflictPolicy } from '../resolver/types.js';

export type OutputFormat = 'text' | 'json';

/**
 * Configuration for a merge run
 */
export interface MergeConfig {
  /** Source roots, merged in order */
  sources: string[];

  /** Destination root (created if absent) */
  destination: string | null;

  merge: {
    /** How conflicting paths are resolved */
    policy: ConflictPolicy;

    /** Number of files copied in parallel */
    concurrency: number;

    /** Keep modification times and permission bits */
    preserveMetadata: boolean;

    /** Traverse symlinked directories and copy symlink targets */
    followSymlinks: boolean;

    /** null = follow the host filesystem */
    caseSensitive: boolean | null;

    /** Skip conflicts whose size and modification time already match */
    skipIdentical: boolean;

    /** Report what would happen without writing anything */
    dryRun: boolean;
  };

  /** Directory filtering options */
  filters: {
    /** Directory names to exclude (e.g., [".git", "node_modules"]) */
    excludeDirs: string[];
  };

  /** Output configuration */
  output: {
    format: OutputFormat;

    /** Optional file path to write the report to (null = stdout) */
    outputFile: string | null;

    /** Failures listed in the text report before the rest are summarised */
    maxFailuresShown: number;

    /** Optional file the log is appended to, without colours (null = console only) */
    logFile: string | null;
  };
}

/**
 * Values given on the command line; each one replaces the configured value
 */
export interface ConfigOverrides {
  sources?: readonly string[];
  destination?: string;
  policy?: ConflictPolicy;
  concurrency?: number;
  preserveMetadata?: boolean;
  followSymlinks?: boolean;
  dryRun?: boolean;
  format?: OutputFormat;
  outputFile?: string;
  logFile?: string;
}
