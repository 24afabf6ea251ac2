import type { TreeEntry } from '../comparator/types.js';

export type MergeOperation =
  | { type: 'copy'; fromRoot: string; source: TreeEntry }
  | { type: 'overwrite'; fromRoot: string; source: TreeEntry }
  | { type: 'skip'; fromRoot: string };

/**
 * One scheduled unit of work. Every action of a pass targets a different
 * destination path.
 */
export interface MergeAction {
  /** Destination path relative to the destination root */
  relativePath: string;
  operation: MergeOperation;
}

export type CopyFailureKind =
  | 'SourceUnreadable'
  | 'DestinationUnwritable'
  | 'OutOfSpace'
  | 'InterruptedCopy';

export type MergeOutcome =
  | { status: 'Succeeded' }
  | { status: 'Skipped' }
  | { status: 'Failed'; kind: CopyFailureKind; message: string }
  | { status: 'Cancelled' };

export type OutcomeStatus = MergeOutcome['status'];

/**
 * Copies the bytes of one file. The destination does not exist beforehand.
 */
export type CopyPrimitive = (source: string, destination: string) => Promise<void>;

export interface CopyWorkerOptions {
  destinationRoot: string;

  /** Carry modification time and permission bits over to the copy */
  preserveMetadata?: boolean;

  /** Report copies as done without touching the filesystem */
  dryRun?: boolean;

  copy?: CopyPrimitive;
}
