import type { ConflictPolicy } from '../resolver/types.js';
import type { CopyPrimitive, MergeOutcome } from '../worker/types.js';

export interface MergeOptions {
  policy: ConflictPolicy;

  /** Number of copies in flight; values below 1 are treated as 1 */
  concurrency: number;

  preserveMetadata: boolean;
  followSymlinks: boolean;
  caseSensitive: boolean;

  /** Skip conflicting paths whose size and modification time already match */
  skipIdentical: boolean;

  /** Plan and report without writing to the destination */
  dryRun: boolean;

  /** Directory names never traversed, in sources or destination */
  excludeDirs: string[];
}

/**
 * Emitted once per finished action
 */
export interface MergeProgress {
  pass: number;
  root: string;
  completed: number;
  total: number;
  relativePath: string;
  outcome: MergeOutcome;
}

export type MergeProgressCallback = (progress: MergeProgress) => void;

export interface MergeRunOptions extends Partial<MergeOptions> {
  /** Checked between actions; an in-flight copy always runs to completion */
  signal?: AbortSignal;

  onProgress?: MergeProgressCallback;

  /** Replaces the byte-copy primitive used by the workers */
  copy?: CopyPrimitive;
}
