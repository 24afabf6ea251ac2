import type { ConflictDecision, ConflictPolicy, FileMetadata, ResolverOptions } from './types.js';
import { CONFLICT_POLICIES } from './types.js';

/**
 * Decides what to do with a path present in both the source (A) and the destination (B).
 * Ties and missing timestamps under NewerWins keep the destination.
 */
export function decide(
  path: string,
  policy: ConflictPolicy,
  metaA: FileMetadata | undefined,
  metaB: FileMetadata | undefined,
  options: ResolverOptions = {}
): ConflictDecision {
  if (options.skipIdentical && looksIdentical(metaA, metaB)) {
    return 'Skip';
  }

  switch (policy) {
    case 'AlwaysOverwrite':
      return 'Overwrite';
    case 'NeverOverwrite':
      return 'Skip';
    case 'NewerWins': {
      const sourceTime = metaA?.modifiedAt?.getTime();
      const destinationTime = metaB?.modifiedAt?.getTime();
      if (sourceTime === undefined || destinationTime === undefined) {
        return 'Skip';
      }
      return sourceTime > destinationTime ? 'Overwrite' : 'Skip';
    }
    default:
      return assertNever(policy, path);
  }
}

export function isConflictPolicy(value: unknown): value is ConflictPolicy {
  return CONFLICT_POLICIES.some(policy => policy === value);
}

function looksIdentical(metaA: FileMetadata | undefined, metaB: FileMetadata | undefined): boolean {
  if (!metaA?.modifiedAt || !metaB?.modifiedAt) {
    return false;
  }
  return metaA.size === metaB.size && metaA.modifiedAt.getTime() === metaB.modifiedAt.getTime();
}

function assertNever(policy: never, path: string): never {
  throw new Error(`Unknown conflict policy for ${path}: ${String(policy)}`);
}
