import fs from 'node:fs/promises';
import path from 'node:path';
import type { ConfigOverrides, MergeConfig } from './types.js';
import type { MergeOptions } from '../coordinator/types.js';
import { defaultConfig, defaultMergeOptions } from './defaults.js';
import { isConflictPolicy } from '../resolver/conflict-resolver.js';
import { errorCode } from '../utils/errors.js';

/**
 * Loads configuration from a JSON file
 * @param configPath - Path to the configuration file
 * @returns Loaded configuration merged with defaults
 */
export async function loadConfig(configPath: string): Promise<MergeConfig> {
  let configContent: string;
  try {
    configContent = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new Error(`Configuration file not found: ${configPath}`);
    }
    throw error;
  }

  const userConfig: Partial<MergeConfig> = JSON.parse(configContent);
  if (typeof userConfig !== 'object' || userConfig === null || Array.isArray(userConfig)) {
    throw new Error('Configuration error: the configuration file must contain a JSON object');
  }

  // Deep merge with defaults
  const config: MergeConfig = {
    ...defaultConfig,
    ...userConfig,
    merge: {
      ...defaultConfig.merge,
      ...userConfig.merge
    },
    filters: {
      ...defaultConfig.filters,
      ...userConfig.filters
    },
    output: {
      ...defaultConfig.output,
      ...userConfig.output
    }
  };

  // Relative roots are taken relative to the configuration file
  const baseDir = path.dirname(path.resolve(configPath));
  if (Array.isArray(config.sources)) {
    config.sources = config.sources.map(source =>
      typeof source === 'string' ? path.resolve(baseDir, source) : source
    );
  }
  if (typeof config.destination === 'string') {
    config.destination = path.resolve(baseDir, config.destination);
  }
  if (typeof config.output.logFile === 'string') {
    config.output.logFile = path.resolve(baseDir, config.output.logFile);
  }

  validateConfig(config, { requireRoots: false });

  return config;
}

/**
 * Returns a copy of the configuration with command-line values applied
 */
export function applyOverrides(config: MergeConfig, overrides: ConfigOverrides): MergeConfig {
  return {
    ...config,
    sources:
      overrides.sources && overrides.sources.length > 0
        ? overrides.sources.map(source => path.resolve(source))
        : config.sources,
    destination: overrides.destination !== undefined ? path.resolve(overrides.destination) : config.destination,
    merge: {
      ...config.merge,
      policy: overrides.policy ?? config.merge.policy,
      concurrency: overrides.concurrency ?? config.merge.concurrency,
      preserveMetadata: overrides.preserveMetadata || config.merge.preserveMetadata,
      followSymlinks: overrides.followSymlinks || config.merge.followSymlinks,
      dryRun: overrides.dryRun || config.merge.dryRun
    },
    filters: { ...config.filters },
    output: {
      ...config.output,
      format: overrides.format ?? config.output.format,
      outputFile: overrides.outputFile ?? config.output.outputFile,
      logFile: overrides.logFile !== undefined ? path.resolve(overrides.logFile) : config.output.logFile
    }
  };
}

export interface ValidationOptions {
  /** Require sources and a destination (they may still come from the command line while loading) */
  requireRoots: boolean;
}

/**
 * Validates the configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: MergeConfig, options: ValidationOptions = { requireRoots: true }): void {
  if (!Array.isArray(config.sources) || !config.sources.every(source => typeof source === 'string')) {
    throw new Error('Configuration error: sources must be a list of directories');
  }

  if (config.destination !== null && typeof config.destination !== 'string') {
    throw new Error('Configuration error: destination must be a directory path');
  }

  if (options.requireRoots) {
    if (config.sources.length === 0) {
      throw new Error('Configuration error: sources must contain at least one directory');
    }
    if (!config.destination) {
      throw new Error('Configuration error: a destination directory is required');
    }
  }

  if (!isConflictPolicy(config.merge.policy)) {
    throw new Error(
      'Configuration error: policy must be "AlwaysOverwrite", "NeverOverwrite" or "NewerWins"'
    );
  }

  if (!Number.isInteger(config.merge.concurrency) || config.merge.concurrency < 1) {
    throw new Error('Configuration error: concurrency must be a positive integer');
  }

  for (const key of ['preserveMetadata', 'followSymlinks', 'skipIdentical', 'dryRun'] as const) {
    if (typeof config.merge[key] !== 'boolean') {
      throw new Error(`Configuration error: ${key} must be true or false`);
    }
  }

  if (config.merge.caseSensitive !== null && typeof config.merge.caseSensitive !== 'boolean') {
    throw new Error('Configuration error: caseSensitive must be true, false or null');
  }

  if (
    !Array.isArray(config.filters.excludeDirs) ||
    !config.filters.excludeDirs.every(name => typeof name === 'string')
  ) {
    throw new Error('Configuration error: excludeDirs must be a list of directory names');
  }

  if (config.output.format !== 'text' && config.output.format !== 'json') {
    throw new Error('Configuration error: output format must be "text" or "json"');
  }

  if (config.output.logFile !== null && typeof config.output.logFile !== 'string') {
    throw new Error('Configuration error: logFile must be a file path');
  }

  if (!Number.isInteger(config.output.maxFailuresShown) || config.output.maxFailuresShown < 0) {
    throw new Error('Configuration error: maxFailuresShown must be zero or a positive integer');
  }
}

/**
 * Translates the configuration into merge engine options
 */
export function toMergeOptions(config: MergeConfig): MergeOptions {
  return {
    policy: config.merge.policy,
    concurrency: config.merge.concurrency,
    preserveMetadata: config.merge.preserveMetadata,
    followSymlinks: config.merge.followSymlinks,
    caseSensitive: config.merge.caseSensitive ?? defaultMergeOptions.caseSensitive,
    skipIdentical: config.merge.skipIdentical,
    dryRun: config.merge.dryRun,
    excludeDirs: [...config.filters.excludeDirs]
  };
}

/**
 * Finds the configuration file path
 * @param providedPath - Optional path provided by user
 * @returns Path to configuration file, or undefined when none was given and
 *   there is no merge-dirs.json in the current directory
 */
export async function resolveConfigPath(providedPath?: string): Promise<string | undefined> {
  if (providedPath) {
    return path.resolve(providedPath);
  }

  const fallback = path.resolve('merge-dirs.json');
  try {
    await fs.access(fallback);
    return fallback;
  } catch {
    return undefined;
  }
}
