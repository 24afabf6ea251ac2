import type { ClassificationStats, ComparedPath, PathComparison, TreeScan } from './types.js';
import { scanTree } from '../utils/file-scanner.js';
import type { ScanOptions } from '../utils/file-scanner.js';
import { compareKeys } from '../utils/path-normalizer.js';

/**
 * Walks both roots and classifies every relative path found in either of them
 * @param rootA - Source side
 * @param rootB - Destination side
 * @returns Paths sorted by comparison key, plus the subtrees that could not be listed
 */
export async function enumerate(
  rootA: string,
  rootB: string,
  options: ScanOptions = {}
): Promise<PathComparison> {
  const [scanA, scanB] = await Promise.all([
    scanTree(rootA, options),
    scanTree(rootB, options)
  ]);

  return compareTrees(scanA, scanB);
}

/**
 * Classifies the entries of two prepared scans. Both scans must have been keyed
 * with the same case sensitivity.
 */
export function compareTrees(scanA: TreeScan, scanB: TreeScan): PathComparison {
  const paths: ComparedPath[] = [];

  for (const [key, a] of scanA.entries) {
    const b = scanB.entries.get(key);
    if (b) {
      paths.push({ key, classification: 'InBoth', a, b });
    } else {
      paths.push({ key, classification: 'OnlyInA', a });
    }
  }

  for (const [key, b] of scanB.entries) {
    if (!scanA.entries.has(key)) {
      paths.push({ key, classification: 'OnlyInB', b });
    }
  }

  // Sort results for reproducible work lists
  paths.sort((x, y) => compareKeys(x.key, y.key));

  return {
    paths,
    failures: [...scanA.failures, ...scanB.failures]
  };
}

/**
 * Counts paths per classification
 */
export function getClassificationStats(comparison: PathComparison): ClassificationStats {
  const stats: ClassificationStats = { onlyInA: 0, onlyInB: 0, inBoth: 0 };
  for (const entry of comparison.paths) {
    switch (entry.classification) {
      case 'OnlyInA':
        stats.onlyInA++;
        break;
      case 'OnlyInB':
        stats.onlyInB++;
        break;
      case 'InBoth':
        stats.inBoth++;
        break;
    }
  }
  return stats;
}
