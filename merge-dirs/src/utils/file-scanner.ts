import fs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import type { EnumerationFailureKind, TreeEntry, TreeScan } from '../comparator/types.js';
import { logger } from './logger.js';
import { describeError } from './errors.js';
import {
  compareKeys,
  displayPath,
  hostIsCaseSensitive,
  joinRelative,
  toComparisonKey
} from './path-normalizer.js';

export interface ScanOptions {
  /** Traverse directory symlinks and treat file symlinks as their targets */
  followSymlinks?: boolean;

  /** Defaults to the host filesystem's behaviour */
  caseSensitive?: boolean;

  /** Directory names to exclude (e.g., [".git", "node_modules"]) */
  excludeDirs?: string[];
}

interface PendingDirectory {
  absolutePath: string;
  relativePath: string;

  /** Canonical paths of the directories above this one; only tracked when following symlinks */
  ancestors: ReadonlySet<string>;
}

/**
 * Walks a directory tree depth-first and collects its files (and symlinks, when
 * not following them). Directories that cannot be listed are recorded as
 * failures and the walk continues with their siblings.
 */
export async function scanTree(root: string, options: ScanOptions = {}): Promise<TreeScan> {
  const followSymlinks = options.followSymlinks ?? false;
  const caseSensitive = options.caseSensitive ?? hostIsCaseSensitive();
  const scan: TreeScan = { root, entries: new Map(), failures: [] };

  const recordFailure = (
    relativePath: string,
    message: string,
    kind: EnumerationFailureKind = 'AccessError'
  ): void => {
    logger.warn(`${kind} at ${path.join(root, displayPath(relativePath))}: ${message}`);
    scan.failures.push({ kind, root, relativePath, message });
  };

  const addEntry = (relativePath: string, absolutePath: string, kind: TreeEntry['kind'], stats: Stats): void => {
    const key = toComparisonKey(relativePath, caseSensitive);
    const existing = scan.entries.get(key);
    if (existing) {
      recordFailure(relativePath, `name collides with ${existing.relativePath}`, 'NameCollision');
      return;
    }
    scan.entries.set(key, {
      relativePath,
      absolutePath,
      kind,
      size: stats.size,
      modifiedAt: stats.mtimeMs > 0 ? stats.mtime : undefined,
      mode: stats.mode & 0o7777
    });
  };

  const stack: PendingDirectory[] = [{ absolutePath: root, relativePath: '', ancestors: new Set() }];

  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    let ancestors = current.ancestors;

    if (followSymlinks) {
      let canonical: string;
      try {
        canonical = await fs.realpath(current.absolutePath);
      } catch (error) {
        recordFailure(current.relativePath, describeError(error));
        continue;
      }
      if (ancestors.has(canonical)) {
        logger.debug(`Skipping symlink cycle: ${current.absolutePath} -> ${canonical}`);
        continue;
      }
      ancestors = new Set([...ancestors, canonical]);
    }

    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(current.absolutePath, { withFileTypes: true });
    } catch (error) {
      recordFailure(current.relativePath, describeError(error));
      continue;
    }
    dirents.sort((a, b) => compareKeys(a.name, b.name));

    const subdirectories: PendingDirectory[] = [];

    for (const dirent of dirents) {
      const absolutePath = path.join(current.absolutePath, dirent.name);
      const relativePath = joinRelative(current.relativePath, dirent.name);

      if (dirent.isDirectory()) {
        if (shouldExcludeDirectory(dirent.name, options)) {
          logger.debug(`Excluding directory: ${absolutePath}`);
          continue;
        }
        subdirectories.push({ absolutePath, relativePath, ancestors });
        continue;
      }

      if (!dirent.isFile() && !dirent.isSymbolicLink()) {
        logger.debug(`Skipping special file: ${absolutePath}`);
        continue;
      }

      let stats: Stats;
      try {
        stats = followSymlinks ? await fs.stat(absolutePath) : await fs.lstat(absolutePath);
      } catch (error) {
        // Removed mid-walk, or a dangling link while following symlinks
        recordFailure(relativePath, describeError(error));
        continue;
      }

      if (stats.isDirectory()) {
        if (shouldExcludeDirectory(dirent.name, options)) {
          logger.debug(`Excluding directory: ${absolutePath}`);
          continue;
        }
        subdirectories.push({ absolutePath, relativePath, ancestors });
      } else if (stats.isFile()) {
        addEntry(relativePath, absolutePath, 'file', stats);
      } else if (stats.isSymbolicLink()) {
        addEntry(relativePath, absolutePath, 'symlink', stats);
      } else {
        logger.debug(`Skipping special file: ${absolutePath}`);
      }
    }

    // Reversed so that subdirectories are popped in name order
    stack.push(...subdirectories.reverse());
  }

  return scan;
}

/**
 * Determines if a directory should be excluded
 */
function shouldExcludeDirectory(dirName: string, options: ScanOptions): boolean {
  if (!options.excludeDirs || options.excludeDirs.length === 0) {
    return false;
  }

  // Case-insensitive comparison
  const lowerDirName = dirName.toLowerCase();
  return options.excludeDirs.some(excluded => excluded.toLowerCase() === lowerDirName);
}
