import { describe, it, expect } from 'vitest';
import { decide, isConflictPolicy } from './conflict-resolver.js';
import type { FileMetadata } from './types.js';

const older: FileMetadata = { size: 10, modifiedAt: new Date('2024-01-01T00:00:00Z') };
const newer: FileMetadata = { size: 12, modifiedAt: new Date('2024-06-01T00:00:00Z') };
const undated: FileMetadata = { size: 10 };

describe('decide', () => {
  it('should always overwrite under AlwaysOverwrite', () => {
    expect(decide('a.txt', 'AlwaysOverwrite', older, newer)).toBe('Overwrite');
    expect(decide('a.txt', 'AlwaysOverwrite', undefined, undefined)).toBe('Overwrite');
  });

  it('should never overwrite under NeverOverwrite', () => {
    expect(decide('a.txt', 'NeverOverwrite', newer, older)).toBe('Skip');
  });

  it('should overwrite only a strictly older destination under NewerWins', () => {
    expect(decide('a.txt', 'NewerWins', newer, older)).toBe('Overwrite');
    expect(decide('a.txt', 'NewerWins', older, newer)).toBe('Skip');
  });

  it('should keep the destination on a timestamp tie', () => {
    const sameTime: FileMetadata = { size: 99, modifiedAt: new Date(older.modifiedAt?.getTime() ?? 0) };

    expect(decide('a.txt', 'NewerWins', sameTime, older)).toBe('Skip');
  });

  it('should keep the destination when either timestamp is missing', () => {
    expect(decide('a.txt', 'NewerWins', undated, older)).toBe('Skip');
    expect(decide('a.txt', 'NewerWins', newer, undated)).toBe('Skip');
    expect(decide('a.txt', 'NewerWins', undefined, older)).toBe('Skip');
  });

  it('should skip identical files when skipIdentical is set', () => {
    const copy: FileMetadata = { size: 10, modifiedAt: new Date('2024-01-01T00:00:00Z') };

    expect(decide('a.txt', 'AlwaysOverwrite', older, copy, { skipIdentical: true })).toBe('Skip');
    expect(decide('a.txt', 'AlwaysOverwrite', older, copy)).toBe('Overwrite');
  });

  it('should not treat undated files as identical', () => {
    expect(decide('a.txt', 'AlwaysOverwrite', undated, undated, { skipIdentical: true })).toBe('Overwrite');
  });

  it('should return the same decision for the same inputs', () => {
    const first = decide('a.txt', 'NewerWins', newer, older);
    const second = decide('a.txt', 'NewerWins', newer, older);

    expect(first).toBe(second);
  });
});

describe('isConflictPolicy', () => {
  it('should accept the known policies', () => {
    expect(isConflictPolicy('AlwaysOverwrite')).toBe(true);
    expect(isConflictPolicy('NeverOverwrite')).toBe(true);
    expect(isConflictPolicy('NewerWins')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isConflictPolicy('newerwins')).toBe(false);
    expect(isConflictPolicy('KeepBoth')).toBe(false);
    expect(isConflictPolicy(undefined)).toBe(false);
    expect(isConflictPolicy(1)).toBe(false);
  });
});
