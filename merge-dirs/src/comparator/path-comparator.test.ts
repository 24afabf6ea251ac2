import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import { compareTrees, enumerate, getClassificationStats } from './path-comparator.js';
import type { EnumerationFailure, TreeEntry, TreeScan } from './types.js';
import { makeTempDir, writeTree } from '../test-helpers.js';

function entry(relativePath: string): TreeEntry {
  return {
    relativePath,
    absolutePath: `/fixture/${relativePath}`,
    kind: 'file',
    size: 4,
    modifiedAt: new Date('2024-01-01T00:00:00Z'),
    mode: 0o644
  };
}

function scanOf(root: string, paths: string[], failures: EnumerationFailure[] = []): TreeScan {
  return {
    root,
    entries: new Map(paths.map(p => [p, entry(p)])),
    failures
  };
}

describe('compareTrees', () => {
  it('should classify and sort the union of both sides', () => {
    const a = scanOf('/a', ['Movie B/file.mkv', 'Movie A/file.mkv', 'shared.txt']);
    const b = scanOf('/b', ['z.txt', 'shared.txt']);

    const result = compareTrees(a, b);

    expect(result.paths.map(p => [p.key, p.classification])).toEqual([
      ['Movie A/file.mkv', 'OnlyInA'],
      ['Movie B/file.mkv', 'OnlyInA'],
      ['shared.txt', 'InBoth'],
      ['z.txt', 'OnlyInB']
    ]);
  });

  it('should handle both sides empty', () => {
    const result = compareTrees(scanOf('/a', []), scanOf('/b', []));

    expect(result.paths).toEqual([]);
    expect(result.failures).toEqual([]);
  });

  it('should keep both spellings of a case-folded match', () => {
    const a: TreeScan = { root: '/a', entries: new Map([['readme.md', entry('README.md')]]), failures: [] };
    const b: TreeScan = { root: '/b', entries: new Map([['readme.md', entry('readme.md')]]), failures: [] };

    const [match] = compareTrees(a, b).paths;

    expect(match.classification).toBe('InBoth');
    if (match.classification === 'InBoth') {
      expect(match.a.relativePath).toBe('README.md');
      expect(match.b.relativePath).toBe('readme.md');
    }
  });

  it('should carry the failures of both scans', () => {
    const failureA: EnumerationFailure = { kind: 'AccessError', root: '/a', relativePath: 'locked', message: 'denied' };
    const failureB: EnumerationFailure = { kind: 'AccessError', root: '/b', relativePath: '', message: 'gone' };

    const result = compareTrees(scanOf('/a', ['x'], [failureA]), scanOf('/b', [], [failureB]));

    expect(result.failures).toEqual([failureA, failureB]);
  });
});

describe('getClassificationStats', () => {
  it('should count paths per classification', () => {
    const result = compareTrees(
      scanOf('/a', ['a1', 'a2', 'both1', 'both2', 'both3']),
      scanOf('/b', ['b1', 'both1', 'both2', 'both3'])
    );

    expect(getClassificationStats(result)).toEqual({ onlyInA: 2, onlyInB: 1, inBoth: 3 });
  });
});

describe('enumerate', () => {
  let tempDir: string;
  let rootA: string;
  let rootB: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('merge-dirs-enumerate-test-');
    rootA = path.join(tempDir, 'a');
    rootB = path.join(tempDir, 'b');
    await writeTree(rootA, { 'x.txt': '1', 'shared.txt': 'A', 'sub/deep.txt': 'deep' });
    await writeTree(rootB, { 'shared.txt': 'B', 'y.txt': '2' });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should classify every relative path across two roots', async () => {
    const result = await enumerate(rootA, rootB, { caseSensitive: true });

    expect(result.paths.map(p => [p.key, p.classification])).toEqual([
      ['shared.txt', 'InBoth'],
      ['sub/deep.txt', 'OnlyInA'],
      ['x.txt', 'OnlyInA'],
      ['y.txt', 'OnlyInB']
    ]);
    expect(result.failures).toEqual([]);
  });

  it('should attach a missing root as a deferred failure', async () => {
    const missing = path.join(tempDir, 'missing');

    const result = await enumerate(rootA, missing, { caseSensitive: true });

    expect(result.paths.every(p => p.classification === 'OnlyInA')).toBe(true);
    expect(result.paths).toHaveLength(3);
    expect(result.failures.map(f => [f.kind, f.root, f.relativePath])).toEqual([['AccessError', missing, '']]);
  });
});
