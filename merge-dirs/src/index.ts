#!/usr/bin/env node

import { buildApplication, buildCommand, numberParser, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { runMerge } from './merge-dirs.js';
import { exitCodeFor } from './report/format.js';
import { CONFLICT_POLICIES } from './resolver/types.js';
import type { ConflictPolicy } from './resolver/types.js';
import { logger } from './utils/logger.js';

interface MergeFlags {
  dest?: string;
  config?: string;
  policy?: ConflictPolicy;
  concurrency?: number;
  'preserve-metadata': boolean;
  'follow-symlinks': boolean;
  'dry-run': boolean;
  format?: 'text' | 'json';
  output?: string;
  'log-file'?: string;
  debug: boolean;
}

// Define the merge command
const mergeCommand = buildCommand({
  docs: {
    brief: 'Merge source directories into one destination, resolving name collisions by policy'
  },
  parameters: {
    positional: {
      kind: 'array',
      parameter: {
        brief: 'Source directories, merged in order',
        parse: String,
        placeholder: 'source'
      }
    },
    flags: {
      dest: {
        kind: 'parsed',
        brief: 'Destination directory (created if absent)',
        parse: String,
        optional: true
      },
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      policy: {
        kind: 'enum',
        brief: 'Conflict policy',
        values: CONFLICT_POLICIES,
        optional: true
      },
      concurrency: {
        kind: 'parsed',
        brief: 'Number of files copied in parallel',
        parse: numberParser,
        optional: true
      },
      'preserve-metadata': {
        kind: 'boolean',
        brief: 'Keep modification times and permission bits',
        default: false
      },
      'follow-symlinks': {
        kind: 'boolean',
        brief: 'Traverse symlinked directories and copy link targets',
        default: false
      },
      'dry-run': {
        kind: 'boolean',
        brief: 'Report what would be copied without writing anything',
        default: false
      },
      format: {
        kind: 'enum',
        brief: 'Override report format',
        values: ['text', 'json'] as const,
        optional: true
      },
      output: {
        kind: 'parsed',
        brief: 'Write the report to a file',
        parse: String,
        optional: true
      },
      'log-file': {
        kind: 'parsed',
        brief: 'Also append the log, without colours, to a file',
        parse: String,
        optional: true
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      c: 'config',
      p: 'policy',
      j: 'concurrency',
      n: 'dry-run',
      f: 'format',
      o: 'output',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: MergeFlags, ...sources: string[]): Promise<void> {
    const controller = new AbortController();
    const onInterrupt = (): void => {
      logger.warn('Interrupted, letting in-flight copies finish...');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const report = await runMerge({
        configPath: flags.config,
        sources,
        destination: flags.dest,
        policy: flags.policy,
        concurrency: flags.concurrency,
        preserveMetadata: flags['preserve-metadata'],
        followSymlinks: flags['follow-symlinks'],
        dryRun: flags['dry-run'],
        format: flags.format,
        outputFile: flags.output,
        logFile: flags['log-file'],
        debug: flags.debug,
        signal: controller.signal
      });
      process.exitCode = exitCodeFor(report);
    } catch {
      // runMerge has already logged the error
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  }
});

// Build the application
const app = buildApplication(mergeCommand, {
  name: 'merge-dirs',
  versionInfo: {
    currentVersion: '1.0.0'
  }
});

// Run the application
void run(app, process.argv.slice(2), { process });
