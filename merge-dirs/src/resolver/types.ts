/** Which side wins when a path exists in both the source and the destination */
export type ConflictPolicy = 'AlwaysOverwrite' | 'NeverOverwrite' | 'NewerWins';

export const CONFLICT_POLICIES = ['AlwaysOverwrite', 'NeverOverwrite', 'NewerWins'] as const satisfies readonly ConflictPolicy[];

export type ConflictDecision = 'Skip' | 'Overwrite';

/**
 * What the resolver may know about one side of a conflict
 */
export interface FileMetadata {
  size: number;
  modifiedAt?: Date;
}

export interface ResolverOptions {
  /** Skip paths whose size and modification time match on both sides */
  skipIdentical?: boolean;
}
