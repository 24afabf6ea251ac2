import type { EnumerationFailureKind } from '../comparator/types.js';
import type { ConflictPolicy } from '../resolver/types.js';
import type { CopyFailureKind } from '../worker/types.js';

export type MergeFailureKind = EnumerationFailureKind | CopyFailureKind;

/**
 * A path that could not be enumerated or merged
 */
export interface MergeFailure {
  kind: MergeFailureKind;

  /** Index of the pass (source root) the failure happened in */
  pass: number;

  /** Root the path belongs to: the source root for copy failures */
  root: string;

  relativePath: string;

  message: string;
}

export interface OutcomeCounts {
  /** Distinct destination paths written */
  succeeded: number;
  skipped: number;
  failed: number;
  cancelled: number;
}

/**
 * Processing of one source root against the destination
 */
export interface PassSummary {
  index: number;
  root: string;
  totalActions: number;

  /** Per-action counts for this pass */
  counts: OutcomeCounts;

  /** False when the pass was cut short */
  completed: boolean;
}

export type MergeStatus = 'Complete' | 'Incomplete';

export type IncompleteReason = 'Cancelled' | 'DestinationInaccessible';

/**
 * Aggregate result of a merge. Immutable once returned.
 */
export interface MergeReport {
  destination: string;
  roots: readonly string[];
  policy: ConflictPolicy;
  dryRun: boolean;

  status: MergeStatus;
  incompleteReason?: IncompleteReason;

  /** Details of the condition that stopped the merge */
  fatalError?: string;

  counts: Readonly<OutcomeCounts>;

  /** Sorted by pass, then path */
  failures: readonly MergeFailure[];

  /** Destination paths whose actions were dispatched but never started */
  cancelled: readonly string[];

  passes: readonly PassSummary[];

  startTime: Date;
  endTime: Date;
  duration: number;
}
