export { MergeCoordinator, mergeDirectories } from './coordinator/merge-coordinator.js';
export type { MergeOptions, MergeProgress, MergeProgressCallback, MergeRunOptions } from './coordinator/types.js';
export { buildActions } from './coordinator/plan.js';
export { enumerate, compareTrees } from './comparator/path-comparator.js';
export type { ComparedPath, EnumerationFailure, PathClassification, PathComparison, TreeEntry } from './comparator/types.js';
export { decide } from './resolver/conflict-resolver.js';
export type { ConflictDecision, ConflictPolicy, FileMetadata, ResolverOptions } from './resolver/types.js';
export { CopyWorker, streamCopy } from './worker/copy-worker.js';
export type { CopyFailureKind, CopyPrimitive, MergeAction, MergeOperation, MergeOutcome } from './worker/types.js';
export { exitCodeFor, formatJsonReport, formatTextReport } from './report/format.js';
export type { MergeFailure, MergeReport, OutcomeCounts, PassSummary } from './report/types.js';
export { InvalidRootError } from './utils/errors.js';
