import type { EnumerationFailure } from '../comparator/types.js';
import type { ConflictPolicy } from '../resolver/types.js';
import type { MergeAction, MergeOutcome } from '../worker/types.js';
import type {
  IncompleteReason,
  MergeFailure,
  MergeReport,
  OutcomeCounts,
  PassSummary
} from './types.js';
import { compareKeys, toComparisonKey } from '../utils/path-normalizer.js';

export interface ReportContext {
  destination: string;
  roots: readonly string[];
  policy: ConflictPolicy;
  dryRun: boolean;
  caseSensitive: boolean;
}

function emptyCounts(): OutcomeCounts {
  return { succeeded: 0, skipped: 0, failed: 0, cancelled: 0 };
}

/**
 * Accumulates outcomes into a MergeReport. Owned by a single writer, the
 * coordinator; workers never see it.
 */
export class MergeReportBuilder {
  private readonly startTime = new Date();
  private readonly passes: PassSummary[] = [];
  private readonly failures: MergeFailure[] = [];
  private readonly cancelled: string[] = [];
  private readonly counts = emptyCounts();
  private readonly written = new Set<string>();
  private incompleteReason?: IncompleteReason;
  private fatalError?: string;
  private finished = false;

  constructor(private readonly context: ReportContext) {}

  /**
   * Opens a new pass and returns its index
   */
  startPass(root: string, totalActions: number): number {
    this.assertOpen();
    const index = this.passes.length;
    this.passes.push({ index, root, totalActions, counts: emptyCounts(), completed: false });
    return index;
  }

  completePass(index: number): void {
    this.assertOpen();
    this.pass(index).completed = true;
  }

  recordEnumerationFailures(index: number, failures: readonly EnumerationFailure[]): void {
    this.assertOpen();
    for (const failure of failures) {
      this.failures.push({ ...failure, pass: index });
    }
  }

  recordOutcome(index: number, action: MergeAction, outcome: MergeOutcome): void {
    this.assertOpen();
    const pass = this.pass(index);

    switch (outcome.status) {
      case 'Succeeded': {
        pass.counts.succeeded++;
        const key = toComparisonKey(action.relativePath, this.context.caseSensitive);
        if (!this.written.has(key)) {
          this.written.add(key);
          this.counts.succeeded++;
        }
        break;
      }
      case 'Skipped':
        pass.counts.skipped++;
        this.counts.skipped++;
        break;
      case 'Failed':
        pass.counts.failed++;
        this.counts.failed++;
        this.failures.push({
          kind: outcome.kind,
          pass: index,
          root: action.operation.fromRoot,
          relativePath: action.relativePath,
          message: outcome.message
        });
        break;
      case 'Cancelled':
        pass.counts.cancelled++;
        this.counts.cancelled++;
        this.cancelled.push(action.relativePath);
        break;
    }
  }

  /**
   * Marks the merge as stopped early. The first reason recorded wins.
   */
  markIncomplete(reason: IncompleteReason, message?: string): void {
    this.assertOpen();
    if (this.incompleteReason === undefined) {
      this.incompleteReason = reason;
      this.fatalError = message;
    }
  }

  isIncomplete(): boolean {
    return this.incompleteReason !== undefined;
  }

  finish(): MergeReport {
    this.assertOpen();
    this.finished = true;
    const endTime = new Date();

    const failures = [...this.failures].sort(
      (a, b) =>
        a.pass - b.pass ||
        compareKeys(a.relativePath, b.relativePath) ||
        compareKeys(a.kind, b.kind)
    );

    const report: MergeReport = {
      destination: this.context.destination,
      roots: Object.freeze([...this.context.roots]),
      policy: this.context.policy,
      dryRun: this.context.dryRun,
      status: this.incompleteReason === undefined ? 'Complete' : 'Incomplete',
      counts: Object.freeze({ ...this.counts }),
      failures: Object.freeze(failures.map(failure => Object.freeze(failure))),
      cancelled: Object.freeze([...this.cancelled].sort(compareKeys)),
      passes: Object.freeze(
        this.passes.map(pass => Object.freeze({ ...pass, counts: Object.freeze({ ...pass.counts }) }))
      ),
      startTime: this.startTime,
      endTime,
      duration: endTime.getTime() - this.startTime.getTime()
    };
    if (this.incompleteReason !== undefined) {
      report.incompleteReason = this.incompleteReason;
    }
    if (this.fatalError !== undefined) {
      report.fatalError = this.fatalError;
    }

    return Object.freeze(report);
  }

  private pass(index: number): PassSummary {
    const pass = this.passes[index];
    if (!pass) {
      throw new Error(`Unknown pass: ${index}`);
    }
    return pass;
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('Merge report is already finalized');
    }
  }
}
