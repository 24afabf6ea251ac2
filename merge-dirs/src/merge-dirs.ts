import fs from 'node:fs/promises';
import { applyOverrides, loadConfig, resolveConfigPath, toMergeOptions, validateConfig } from './config/config.js';
import { defaultConfig } from './config/defaults.js';
import type { ConfigOverrides, MergeConfig } from './config/types.js';
import { mergeDirectories } from './coordinator/merge-coordinator.js';
import type { MergeProgress } from './coordinator/types.js';
import { formatJsonReport, formatTextReport } from './report/format.js';
import type { MergeReport } from './report/types.js';
import { logger } from './utils/logger.js';

export interface RunMergeOptions extends ConfigOverrides {
  configPath?: string;
  debug?: boolean;

  /** Aborting stops the merge between actions */
  signal?: AbortSignal;
}

/**
 * Main entry point for a merge run: configuration, merge, report output
 */
export async function runMerge(options: RunMergeOptions = {}): Promise<MergeReport> {
  try {
    // Enable debug logging if requested
    if (options.debug) {
      logger.enableDebug();
    }

    const config = await resolveConfig(options);
    const destination = config.destination;
    if (destination === null) {
      throw new Error('Configuration error: a destination directory is required');
    }

    // Keep stdout clean for a JSON report
    logger.setQuiet(config.output.format === 'json' && config.output.outputFile === null);
    if (config.output.logFile !== null) {
      logger.setLogFile(config.output.logFile);
      logger.debug(`Appending log to: ${config.output.logFile}`);
    }

    const report = await mergeDirectories(config.sources, destination, {
      ...toMergeOptions(config),
      signal: options.signal,
      onProgress: logProgress
    });

    await outputReport(report, config);

    if (report.status === 'Complete' && report.failures.length === 0) {
      logger.success('Merge complete!');
    }
    return report;
  } catch (error) {
    logger.error('Merge failed:', error instanceof Error ? error.message : String(error));
    throw error;
  } finally {
    logger.setLogFile(null);
  }
}

/**
 * Loads the configuration file (if any) and applies command-line overrides
 */
export async function resolveConfig(options: RunMergeOptions): Promise<MergeConfig> {
  const configPath = await resolveConfigPath(options.configPath);
  let config = defaultConfig;
  if (configPath !== undefined) {
    logger.info(`Loading configuration from: ${configPath}`);
    config = await loadConfig(configPath);
  }

  const resolved = applyOverrides(config, options);
  validateConfig(resolved);
  return resolved;
}

function logProgress(progress: MergeProgress): void {
  if (progress.outcome.status === 'Failed') {
    logger.warn(`${progress.outcome.kind}: ${progress.relativePath}: ${progress.outcome.message}`);
  }
  logger.debug(`[${progress.completed}/${progress.total}] ${progress.outcome.status} ${progress.relativePath}`);
}

/**
 * Writes the report to the configured file, or stdout
 */
async function outputReport(report: MergeReport, config: MergeConfig): Promise<void> {
  const output =
    config.output.format === 'json'
      ? formatJsonReport(report)
      : formatTextReport(report, { maxFailuresShown: config.output.maxFailuresShown });

  if (config.output.outputFile) {
    logger.info(`Writing report to: ${config.output.outputFile}`);
    await fs.writeFile(config.output.outputFile, output, 'utf-8');
  } else {
    console.log(config.output.format === 'json' ? output : '\n' + output);
  }
}
