import type { PathComparison } from '../comparator/types.js';
import { decide } from '../resolver/conflict-resolver.js';
import type { MergeAction } from '../worker/types.js';
import { toComparisonKey } from '../utils/path-normalizer.js';
import type { MergeOptions } from './types.js';

/**
 * Turns one source-against-destination comparison into the pass's work list.
 * Paths found only in the destination need no action. Source paths under a
 * destination subtree that could not be listed are skipped, since whatever
 * they would replace there is unknown.
 */
export function buildActions(
  comparison: PathComparison,
  fromRoot: string,
  options: Pick<MergeOptions, 'policy' | 'skipIdentical' | 'caseSensitive'>
): MergeAction[] {
  const actions: MergeAction[] = [];
  const unlisted = comparison.failures
    .filter(failure => failure.kind === 'AccessError' && failure.root !== fromRoot)
    .map(failure => toComparisonKey(failure.relativePath, options.caseSensitive));

  for (const entry of comparison.paths) {
    switch (entry.classification) {
      case 'OnlyInA':
        actions.push({
          relativePath: entry.a.relativePath,
          operation: isUnder(entry.key, unlisted)
            ? { type: 'skip', fromRoot }
            : { type: 'copy', fromRoot, source: entry.a }
        });
        break;
      case 'OnlyInB':
        break;
      case 'InBoth': {
        // The destination keeps its own spelling of the name
        const relativePath = entry.b.relativePath;
        const decision = decide(relativePath, options.policy, entry.a, entry.b, {
          skipIdentical: options.skipIdentical
        });
        actions.push({
          relativePath,
          operation:
            decision === 'Overwrite'
              ? { type: 'overwrite', fromRoot, source: entry.a }
              : { type: 'skip', fromRoot }
        });
        break;
      }
    }
  }

  return actions;
}

function isUnder(key: string, prefixes: readonly string[]): boolean {
  return prefixes.some(prefix => prefix === '' || key === prefix || key.startsWith(`${prefix}/`));
}
