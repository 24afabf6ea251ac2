/**
 * A mergeable item found under a root: a regular file, or a symlink kept as a link
 */
export interface TreeEntry {
  /** Forward-slash path relative to the root */
  relativePath: string;

  /** Absolute path on disk */
  absolutePath: string;

  kind: 'file' | 'symlink';

  size: number;

  /** Missing when the filesystem does not report modification times */
  modifiedAt?: Date;

  /** Permission bits */
  mode: number;
}

export type EnumerationFailureKind = 'AccessError' | 'NameCollision';

/**
 * A part of a tree that could not be enumerated. Deferred: the walk carries on
 * with sibling subtrees.
 */
export interface EnumerationFailure {
  kind: EnumerationFailureKind;

  /** Root the failing path belongs to */
  root: string;

  /** Directory (or file) the failure is attached to; '' is the root itself */
  relativePath: string;

  message: string;
}

/**
 * Result of walking one root
 */
export interface TreeScan {
  root: string;

  /** Entries keyed by comparison key */
  entries: Map<string, TreeEntry>;

  failures: EnumerationFailure[];
}

export type PathClassification = 'OnlyInA' | 'OnlyInB' | 'InBoth';

export type ComparedPath =
  | { key: string; classification: 'OnlyInA'; a: TreeEntry }
  | { key: string; classification: 'OnlyInB'; b: TreeEntry }
  | { key: string; classification: 'InBoth'; a: TreeEntry; b: TreeEntry };

/**
 * Result of comparing two roots
 */
export interface PathComparison {
  /** Sorted by comparison key */
  paths: ComparedPath[];

  failures: EnumerationFailure[];
}

export interface ClassificationStats {
  onlyInA: number;
  onlyInB: number;
  inBoth: number;
}
