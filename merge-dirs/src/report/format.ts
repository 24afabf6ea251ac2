import chalk from 'chalk';
import type { MergeReport } from './types.js';
import { displayPath } from '../utils/path-normalizer.js';

export interface TextFormatOptions {
  /** Number of failures listed before the rest are summarised */
  maxFailuresShown: number;
}

/**
 * Process exit code for a finished merge: 0 only when nothing failed and every pass ran
 */
export function exitCodeFor(report: MergeReport): number {
  return report.failures.length === 0 && report.status === 'Complete' ? 0 : 1;
}

/**
 * Formats a report as human-readable text
 */
export function formatTextReport(report: MergeReport, options: TextFormatOptions): string {
  const lines: string[] = [];

  lines.push(chalk.bold.cyan('='.repeat(80)));
  lines.push(chalk.bold.cyan(report.dryRun ? 'MERGE PLAN (DRY RUN)' : 'MERGE RESULTS'));
  lines.push(chalk.bold.cyan('='.repeat(80)));
  lines.push('');

  for (const pass of report.passes) {
    const state = pass.completed ? '' : chalk.red(' (stopped)');
    lines.push(
      `  Pass ${pass.index + 1}: ${pass.root} - ${pass.totalActions} actions, ` +
        `${pass.counts.succeeded} written, ${pass.counts.skipped} skipped, ` +
        `${pass.counts.failed} failed${state}`
    );
  }
  if (report.passes.length > 0) {
    lines.push('');
  }

  if (report.failures.length > 0) {
    lines.push(chalk.bold.red(`Failures (${report.failures.length}):`));
    lines.push(chalk.red('-'.repeat(80)));
    for (const failure of report.failures.slice(0, options.maxFailuresShown)) {
      lines.push(`  ${failure.kind.padEnd(22)} ${displayPath(failure.relativePath)}: ${failure.message}`);
    }
    const hidden = report.failures.length - options.maxFailuresShown;
    if (hidden > 0) {
      lines.push(chalk.gray(`  ... and ${hidden} more`));
    }
    lines.push('');
  }

  if (report.status === 'Incomplete') {
    const detail = report.fatalError ? `: ${report.fatalError}` : '';
    lines.push(chalk.bold.red(`INCOMPLETE (${report.incompleteReason ?? 'unknown'})${detail}`));
    lines.push('');
  }

  // Summary
  lines.push(chalk.bold.cyan('SUMMARY'));
  lines.push(chalk.cyan('-'.repeat(80)));
  lines.push(`  Destination:        ${report.destination}`);
  lines.push(`  Source roots:       ${report.roots.length}`);
  lines.push(`  Policy:             ${report.policy}`);
  lines.push(`  Files written:      ${chalk.green(report.counts.succeeded.toString())}`);
  lines.push(`  Skipped:            ${chalk.yellow(report.counts.skipped.toString())}`);
  lines.push(`  Failed:             ${chalk.red(report.counts.failed.toString())}`);
  if (report.counts.cancelled > 0) {
    lines.push(`  Cancelled:          ${chalk.magenta(report.counts.cancelled.toString())}`);
  }
  lines.push(`  Duration:           ${formatDuration(report.duration)}`);
  lines.push(chalk.bold.cyan('='.repeat(80)));

  return lines.join('\n');
}

/**
 * Formats a report as JSON
 */
export function formatJsonReport(report: MergeReport): string {
  const output = {
    timestamp: report.endTime.toISOString(),
    destination: report.destination,
    roots: report.roots,
    policy: report.policy,
    dryRun: report.dryRun,
    status: report.status,
    incompleteReason: report.incompleteReason ?? null,
    fatalError: report.fatalError ?? null,
    summary: report.counts,
    passes: report.passes,
    failures: report.failures,
    cancelled: report.cancelled,
    duration: report.duration
  };

  return JSON.stringify(output, null, 2);
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${(ms / 60000).toFixed(2)}m`;
}
