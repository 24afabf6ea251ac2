import fs from 'node:fs/promises';
import { constants } from 'node:fs';
import type { Stats } from 'node:fs';
import path from 'node:path';
import type { PathComparison, TreeEntry, TreeScan } from '../comparator/types.js';
import { compareTrees, enumerate, getClassificationStats } from '../comparator/path-comparator.js';
import { defaultMergeOptions } from '../config/defaults.js';
import { MergeReportBuilder } from '../report/merge-report.js';
import type { MergeReport } from '../report/types.js';
import { formatDuration } from '../report/format.js';
import { CopyWorker } from '../worker/copy-worker.js';
import type { MergeAction, MergeOutcome } from '../worker/types.js';
import { Channel } from '../utils/channel.js';
import { describeError, InvalidRootError } from '../utils/errors.js';
import { scanTree } from '../utils/file-scanner.js';
import type { ScanOptions } from '../utils/file-scanner.js';
import { logger } from '../utils/logger.js';
import { isSameOrInside, toComparisonKey, toNativePath } from '../utils/path-normalizer.js';
import { buildActions } from './plan.js';
import type { MergeOptions, MergeRunOptions } from './types.js';

interface CompletedAction {
  action: MergeAction;
  outcome: MergeOutcome;
}

/**
 * Merges source roots into a destination one pass per root. Within a pass the
 * actions are copied by a bounded pool of lanes; all of them settle before the
 * next root is processed, so root order decides precedence.
 */
export class MergeCoordinator {
  private readonly options: MergeOptions;

  constructor(private readonly runOptions: MergeRunOptions = {}) {
    this.options = {
      policy: runOptions.policy ?? defaultMergeOptions.policy,
      concurrency: runOptions.concurrency ?? defaultMergeOptions.concurrency,
      preserveMetadata: runOptions.preserveMetadata ?? defaultMergeOptions.preserveMetadata,
      followSymlinks: runOptions.followSymlinks ?? defaultMergeOptions.followSymlinks,
      caseSensitive: runOptions.caseSensitive ?? defaultMergeOptions.caseSensitive,
      skipIdentical: runOptions.skipIdentical ?? defaultMergeOptions.skipIdentical,
      dryRun: runOptions.dryRun ?? defaultMergeOptions.dryRun,
      excludeDirs: runOptions.excludeDirs ?? defaultMergeOptions.excludeDirs
    };
  }

  async merge(roots: readonly string[], destination: string): Promise<MergeReport> {
    const sourceRoots = roots.map(root => path.resolve(root));
    const destinationRoot = path.resolve(destination);
    await validateRoots(sourceRoots, destinationRoot);

    const { signal } = this.runOptions;
    const concurrency = Number.isFinite(this.options.concurrency)
      ? Math.max(1, Math.floor(this.options.concurrency))
      : 1;
    const report = new MergeReportBuilder({
      destination: destinationRoot,
      roots: sourceRoots,
      policy: this.options.policy,
      dryRun: this.options.dryRun,
      caseSensitive: this.options.caseSensitive
    });
    // What earlier passes would have written, when nothing is written for real
    const planned = new Map<string, TreeEntry>();

    logger.info(
      `Merging ${sourceRoots.length} source root${sourceRoots.length === 1 ? '' : 's'} into ${destinationRoot} ` +
        `(policy: ${this.options.policy}, concurrency: ${concurrency}${this.options.dryRun ? ', dry run' : ''})`
    );

    for (const [index, root] of sourceRoots.entries()) {
      if (signal?.aborted) {
        logger.warn('Merge cancelled');
        report.markIncomplete('Cancelled');
        break;
      }

      const problem = await this.prepareDestination(destinationRoot);
      if (problem !== undefined) {
        logger.error(`Destination is not accessible: ${problem}`);
        report.markIncomplete('DestinationInaccessible', problem);
        break;
      }

      logger.info(`Pass ${index + 1}/${sourceRoots.length}: ${root}`);
      await this.runPass(report, root, destinationRoot, concurrency, planned);
      if (report.isIncomplete()) {
        break;
      }
    }

    const result = report.finish();
    logger.info(
      `Merge ${result.status === 'Complete' ? 'finished' : 'stopped'} in ${formatDuration(result.duration)}: ` +
        `${result.counts.succeeded} written, ${result.counts.skipped} skipped, ` +
        `${result.counts.failed} failed, ${result.counts.cancelled} cancelled`
    );
    return result;
  }

  private async runPass(
    report: MergeReportBuilder,
    root: string,
    destinationRoot: string,
    concurrency: number,
    planned: Map<string, TreeEntry>
  ): Promise<void> {
    const comparison = await this.compare(root, destinationRoot, planned);
    const actions = buildActions(comparison, root, this.options);
    const index = report.startPass(root, actions.length);
    report.recordEnumerationFailures(index, comparison.failures);

    const stats = getClassificationStats(comparison);
    logger.debug(
      `Only in source: ${stats.onlyInA}, only in destination: ${stats.onlyInB}, in both: ${stats.inBoth}`
    );
    logger.info(`Dispatching ${actions.length} actions`);

    const worker = new CopyWorker({
      destinationRoot,
      preserveMetadata: this.options.preserveMetadata,
      dryRun: this.options.dryRun,
      copy: this.runOptions.copy
    });

    const channel = new Channel<CompletedAction>();
    const { signal, onProgress } = this.runOptions;
    let cursor = 0;

    const lane = async (): Promise<void> => {
      while (cursor < actions.length) {
        // Cancellation is only observed between actions
        if (signal?.aborted) {
          return;
        }
        const action = actions[cursor++];
        const outcome = await worker.execute(action);
        channel.send({ action, outcome });
      }
    };

    const laneCount = Math.min(concurrency, actions.length);
    const lanes = Promise.all(Array.from({ length: laneCount }, () => lane())).finally(() => channel.close());

    // Single writer: only this loop touches the report while lanes are running
    let completed = 0;
    for await (const { action, outcome } of channel) {
      completed++;
      report.recordOutcome(index, action, outcome);
      logger.debug(`${outcome.status}: ${action.relativePath}`);

      if (this.options.dryRun && outcome.status === 'Succeeded' && action.operation.type !== 'skip') {
        planned.set(toComparisonKey(action.relativePath, this.options.caseSensitive), {
          ...action.operation.source,
          relativePath: action.relativePath,
          absolutePath: toNativePath(destinationRoot, action.relativePath)
        });
      }

      onProgress?.({
        pass: index,
        root,
        completed,
        total: actions.length,
        relativePath: action.relativePath,
        outcome
      });
    }
    await lanes;

    if (cursor < actions.length) {
      logger.warn(`Merge cancelled with ${actions.length - cursor} actions not started`);
      report.markIncomplete('Cancelled');
      for (const action of actions.slice(cursor)) {
        report.recordOutcome(index, action, { status: 'Cancelled' });
      }
      return;
    }

    report.completePass(index);
  }

  private async compare(
    root: string,
    destinationRoot: string,
    planned: Map<string, TreeEntry>
  ): Promise<PathComparison> {
    const scanOptions: ScanOptions = {
      followSymlinks: this.options.followSymlinks,
      caseSensitive: this.options.caseSensitive,
      excludeDirs: this.options.excludeDirs
    };

    if (!this.options.dryRun) {
      return enumerate(root, destinationRoot, scanOptions);
    }

    const [sourceScan, destinationScan] = await Promise.all([
      scanTree(root, scanOptions),
      scanExistingTree(destinationRoot, scanOptions)
    ]);
    for (const [key, entry] of planned) {
      destinationScan.entries.set(key, entry);
    }
    return compareTrees(sourceScan, destinationScan);
  }

  /**
   * Creates the destination if needed; returns a description of the problem when it is unusable
   */
  private async prepareDestination(destinationRoot: string): Promise<string | undefined> {
    try {
      if (!this.options.dryRun) {
        await fs.mkdir(destinationRoot, { recursive: true });
      } else if (!(await pathExists(destinationRoot))) {
        return undefined;
      }

      const stats = await fs.stat(destinationRoot);
      if (!stats.isDirectory()) {
        return `${destinationRoot} is not a directory`;
      }
      const mode = this.options.dryRun ? constants.R_OK : constants.R_OK | constants.W_OK;
      await fs.access(destinationRoot, mode);
      return undefined;
    } catch (error) {
      return describeError(error);
    }
  }
}

/**
 * Merges `roots` into `destination` in order and returns the final report
 */
export function mergeDirectories(
  roots: readonly string[],
  destination: string,
  options: MergeRunOptions = {}
): Promise<MergeReport> {
  return new MergeCoordinator(options).merge(roots, destination);
}

async function validateRoots(sourceRoots: readonly string[], destinationRoot: string): Promise<void> {
  if (sourceRoots.length === 0) {
    throw new Error('At least one source root is required');
  }

  for (const root of sourceRoots) {
    let stats: Stats;
    try {
      stats = await fs.stat(root);
    } catch (error) {
      throw new InvalidRootError(root, describeError(error));
    }
    if (!stats.isDirectory()) {
      throw new InvalidRootError(root, 'not a directory');
    }
    try {
      await fs.access(root, constants.R_OK | constants.X_OK);
    } catch (error) {
      throw new InvalidRootError(root, describeError(error));
    }
    if (isSameOrInside(root, destinationRoot)) {
      throw new InvalidRootError(destinationRoot, `destination lies inside source root ${root}`);
    }
  }
}

async function scanExistingTree(root: string, options: ScanOptions): Promise<TreeScan> {
  if (!(await pathExists(root))) {
    return { root, entries: new Map(), failures: [] };
  }
  return scanTree(root, options);
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
