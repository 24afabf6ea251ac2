import fs from 'node:fs/promises';
import { createReadStream, createWriteStream } from 'node:fs';
import type { Stats } from 'node:fs';
import { randomBytes } from 'node:crypto';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { TreeEntry } from '../comparator/types.js';
import type {
  CopyFailureKind,
  CopyPrimitive,
  CopyWorkerOptions,
  MergeAction,
  MergeOutcome
} from './types.js';
import { describeError, errorCode, isErrnoException } from '../utils/errors.js';
import { toNativePath } from '../utils/path-normalizer.js';
import { logger } from '../utils/logger.js';

const OUT_OF_SPACE_CODES = new Set(['ENOSPC', 'EDQUOT']);

type CopyPhase = 'source' | 'destination' | 'transfer';

class CopyFailure extends Error {
  constructor(
    public readonly kind: CopyFailureKind,
    message: string
  ) {
    super(message);
    this.name = 'CopyFailure';
  }
}

/**
 * Copies a file with streams (works on filesystems without copy_file_range support)
 */
export const streamCopy: CopyPrimitive = async (source, destination) => {
  await pipeline(
    createReadStream(source),
    createWriteStream(destination, { flags: 'wx' })
  );
};

/**
 * Maps an error raised during one phase of a copy to a failure kind
 */
export function classifyCopyError(
  error: unknown,
  phase: CopyPhase,
  sourcePath: string
): CopyFailureKind {
  const code = errorCode(error);
  if (code !== undefined && OUT_OF_SPACE_CODES.has(code)) {
    return 'OutOfSpace';
  }
  switch (phase) {
    case 'source':
      return 'SourceUnreadable';
    case 'destination':
      return 'DestinationUnwritable';
    case 'transfer':
      if (isErrnoException(error) && error.path === sourcePath) {
        return 'SourceUnreadable';
      }
      if (isErrnoException(error) && error.syscall === 'open') {
        return 'DestinationUnwritable';
      }
      return 'InterruptedCopy';
  }
}

/**
 * Executes merge actions against one destination root. Holds no per-action
 * state, so one instance can serve any number of concurrent actions as long as
 * their destination paths differ.
 */
export class CopyWorker {
  private readonly copy: CopyPrimitive;

  constructor(private readonly options: CopyWorkerOptions) {
    this.copy = options.copy ?? streamCopy;
  }

  async execute(action: MergeAction): Promise<MergeOutcome> {
    const { operation } = action;
    if (operation.type === 'skip') {
      return { status: 'Skipped' };
    }
    if (this.options.dryRun) {
      return { status: 'Succeeded' };
    }

    const destination = toNativePath(this.options.destinationRoot, action.relativePath);
    // Written beside the destination and renamed into place, so a failed copy
    // never leaves a partial file at the final path. The name does not grow
    // with the destination's name.
    const tempPath = path.join(path.dirname(destination), `.merge-${randomBytes(6).toString('hex')}.tmp`);

    try {
      await this.place(operation.source, action.relativePath, tempPath, destination);
      return { status: 'Succeeded' };
    } catch (error) {
      await removeTemporary(tempPath);
      if (error instanceof CopyFailure) {
        return { status: 'Failed', kind: error.kind, message: error.message };
      }
      return { status: 'Failed', kind: 'InterruptedCopy', message: describeError(error) };
    }
  }

  private async place(
    source: TreeEntry,
    relativePath: string,
    tempPath: string,
    destination: string
  ): Promise<void> {
    const sourcePath = source.absolutePath;
    const step = async <T>(phase: CopyPhase, run: () => Promise<T>): Promise<T> => {
      try {
        return await run();
      } catch (error) {
        throw new CopyFailure(classifyCopyError(error, phase, sourcePath), describeError(error));
      }
    };

    const stats = await step('source', () =>
      source.kind === 'symlink' ? fs.lstat(sourcePath) : fs.stat(sourcePath)
    );
    if (source.kind === 'file' && !stats.isFile()) {
      throw new CopyFailure('SourceUnreadable', `${sourcePath} is no longer a regular file`);
    }

    const linked = await step('destination', () =>
      findLinkedAncestor(this.options.destinationRoot, relativePath)
    );
    if (linked !== undefined) {
      throw new CopyFailure('DestinationUnwritable', `${linked} is a symbolic link; not writing through it`);
    }

    // recursive mkdir tolerates directories created concurrently by sibling actions
    await step('destination', () => fs.mkdir(path.dirname(destination), { recursive: true }));

    if (source.kind === 'symlink') {
      const target = await step('source', () => fs.readlink(sourcePath));
      await step('destination', () => fs.symlink(target, tempPath));
    } else {
      await step('transfer', () => this.copy(sourcePath, tempPath));
      const written = await step('transfer', () => fs.stat(tempPath));
      if (written.size !== stats.size) {
        throw new CopyFailure(
          'InterruptedCopy',
          `copied ${written.size} of ${stats.size} bytes from ${sourcePath}`
        );
      }
    }

    if (this.options.preserveMetadata) {
      await step('destination', () => preserveMetadata(source.kind, tempPath, stats));
    }

    await step('destination', () => fs.rename(tempPath, destination));
  }
}

/**
 * Returns the first directory between the destination root and the file that is a
 * symlink, if any. Stops at the first missing or non-directory component.
 */
async function findLinkedAncestor(destinationRoot: string, relativePath: string): Promise<string | undefined> {
  let current = destinationRoot;
  for (const segment of relativePath.split('/').slice(0, -1)) {
    current = path.join(current, segment);
    let stats: Stats;
    try {
      stats = await fs.lstat(current);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
    if (stats.isSymbolicLink()) {
      return current;
    }
    if (!stats.isDirectory()) {
      return undefined;
    }
  }
  return undefined;
}

async function preserveMetadata(kind: TreeEntry['kind'], target: string, stats: Stats): Promise<void> {
  if (kind === 'symlink') {
    await fs.lutimes(target, stats.atime, stats.mtime);
    return;
  }
  await fs.chmod(target, stats.mode & 0o7777);
  await fs.utimes(target, stats.atime, stats.mtime);
}

async function removeTemporary(tempPath: string): Promise<void> {
  try {
    await fs.rm(tempPath, { force: true });
  } catch (error) {
    // ENOTDIR: the parent could not be created, so nothing was written
    if (errorCode(error) !== 'ENOTDIR') {
      logger.warn(`Could not remove temporary file ${tempPath}: ${describeError(error)}`);
    }
  }
}
