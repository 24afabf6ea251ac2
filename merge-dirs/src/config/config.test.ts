import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { applyOverrides, loadConfig, resolveConfigPath, toMergeOptions, validateConfig } from './config.js';
import { defaultConfig } from './defaults.js';
import type { MergeConfig } from './types.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'merge-dirs-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: unknown): Promise<string> {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify(content, null, 2));
    return configPath;
  }

  it('should load valid configuration', async () => {
    const configPath = await writeConfig({
      sources: ['/path/to/source1', '/path/to/source2'],
      destination: '/path/to/dest',
      merge: {
        policy: 'NewerWins',
        concurrency: 8,
        preserveMetadata: true
      },
      filters: {
        excludeDirs: ['.git']
      },
      output: {
        format: 'json'
      }
    });

    const config = await loadConfig(configPath);

    expect(config.sources).toEqual(['/path/to/source1', '/path/to/source2']);
    expect(config.destination).toBe('/path/to/dest');
    expect(config.merge.policy).toBe('NewerWins');
    expect(config.merge.concurrency).toBe(8);
    expect(config.merge.preserveMetadata).toBe(true);
    expect(config.filters.excludeDirs).toEqual(['.git']);
    expect(config.output.format).toBe('json');
  });

  it('should merge with defaults for partial config', async () => {
    const configPath = await writeConfig({ sources: ['/source'], destination: '/dest' });

    const config = await loadConfig(configPath);

    expect(config.merge.policy).toBe('NeverOverwrite'); // from defaults
    expect(config.merge.concurrency).toBe(4); // from defaults
    expect(config.merge.caseSensitive).toBeNull();
    expect(config.output.maxFailuresShown).toBe(20);
  });

  it('should resolve relative roots against the configuration file', async () => {
    const configPath = await writeConfig({ sources: ['photos/2023', '../shared'], destination: 'merged' });

    const config = await loadConfig(configPath);

    expect(config.sources).toEqual([path.join(tempDir, 'photos', '2023'), path.resolve(tempDir, '..', 'shared')]);
    expect(config.destination).toBe(path.join(tempDir, 'merged'));
  });

  it('should resolve a relative log file against the configuration file', async () => {
    const configPath = await writeConfig({ output: { logFile: 'logs/merge.log' } });

    const config = await loadConfig(configPath);

    expect(config.output.logFile).toBe(path.join(tempDir, 'logs', 'merge.log'));
  });

  it('should validate the log file', async () => {
    const configPath = await writeConfig({ output: { logFile: 42 } });

    await expect(loadConfig(configPath)).rejects.toThrow('logFile must be a file path');
  });

  it('should allow roots to be left for the command line', async () => {
    const configPath = await writeConfig({ merge: { policy: 'AlwaysOverwrite' } });

    const config = await loadConfig(configPath);

    expect(config.sources).toEqual([]);
    expect(config.destination).toBeNull();
  });

  it('should throw error for missing file', async () => {
    const configPath = path.join(tempDir, 'nonexistent.json');

    await expect(loadConfig(configPath)).rejects.toThrow('Configuration file not found');
  });

  it('should throw error for invalid JSON', async () => {
    const configPath = path.join(tempDir, 'invalid.json');
    await fs.writeFile(configPath, 'invalid json{{{');

    await expect(loadConfig(configPath)).rejects.toThrow();
  });

  it('should reject a file that is not an object', async () => {
    const configPath = await writeConfig(['/source']);

    await expect(loadConfig(configPath)).rejects.toThrow('the configuration file must contain a JSON object');
  });

  it('should validate the policy', async () => {
    const configPath = await writeConfig({ merge: { policy: 'KeepBoth' } });

    await expect(loadConfig(configPath)).rejects.toThrow(
      'policy must be "AlwaysOverwrite", "NeverOverwrite" or "NewerWins"'
    );
  });

  it('should validate concurrency', async () => {
    const configPath = await writeConfig({ merge: { concurrency: 0 } });

    await expect(loadConfig(configPath)).rejects.toThrow('concurrency must be a positive integer');
  });

  it('should validate boolean flags', async () => {
    const configPath = await writeConfig({ merge: { dryRun: 'yes' } });

    await expect(loadConfig(configPath)).rejects.toThrow('dryRun must be true or false');
  });

  it('should validate output format', async () => {
    const configPath = await writeConfig({ output: { format: 'xml' } });

    await expect(loadConfig(configPath)).rejects.toThrow('output format must be "text" or "json"');
  });

  it('should validate excluded directories', async () => {
    const configPath = await writeConfig({ filters: { excludeDirs: '.git' } });

    await expect(loadConfig(configPath)).rejects.toThrow('excludeDirs must be a list of directory names');
  });

  it('should validate sources', async () => {
    const configPath = await writeConfig({ sources: '/source' });

    await expect(loadConfig(configPath)).rejects.toThrow('sources must be a list of directories');
  });
});

describe('validateConfig', () => {
  const complete: MergeConfig = { ...defaultConfig, sources: ['/a'], destination: '/dest' };

  it('should accept a complete configuration', () => {
    expect(() => validateConfig(complete)).not.toThrow();
  });

  it('should require sources', () => {
    expect(() => validateConfig({ ...complete, sources: [] })).toThrow(
      'Configuration error: sources must contain at least one directory'
    );
  });

  it('should require a destination', () => {
    expect(() => validateConfig({ ...complete, destination: null })).toThrow(
      'Configuration error: a destination directory is required'
    );
  });

  it('should validate maxFailuresShown', () => {
    expect(() => validateConfig({ ...complete, output: { ...complete.output, maxFailuresShown: -1 } })).toThrow(
      'maxFailuresShown must be zero or a positive integer'
    );
  });
});

describe('applyOverrides', () => {
  const base: MergeConfig = {
    ...defaultConfig,
    sources: ['/configured'],
    destination: '/configured-dest',
    merge: { ...defaultConfig.merge, policy: 'NewerWins', preserveMetadata: true }
  };

  it('should replace configured values with command-line values', () => {
    const config = applyOverrides(base, {
      sources: ['/one', '/two'],
      destination: '/elsewhere',
      policy: 'AlwaysOverwrite',
      concurrency: 2,
      format: 'json',
      outputFile: '/tmp/report.json',
      logFile: '/tmp/merge.log'
    });

    expect(config.sources).toEqual(['/one', '/two']);
    expect(config.destination).toBe('/elsewhere');
    expect(config.merge.policy).toBe('AlwaysOverwrite');
    expect(config.merge.concurrency).toBe(2);
    expect(config.output.format).toBe('json');
    expect(config.output.outputFile).toBe('/tmp/report.json');
    expect(config.output.logFile).toBe(path.resolve('/tmp/merge.log'));
  });

  it('should keep configured values that are not overridden', () => {
    const config = applyOverrides(base, { dryRun: true });

    expect(config.sources).toEqual(['/configured']);
    expect(config.destination).toBe('/configured-dest');
    expect(config.merge.policy).toBe('NewerWins');
    expect(config.merge.preserveMetadata).toBe(true);
    expect(config.merge.dryRun).toBe(true);
  });

  it('should not modify the configuration it was given', () => {
    applyOverrides(base, { policy: 'AlwaysOverwrite', dryRun: true });

    expect(base.merge.policy).toBe('NewerWins');
    expect(base.merge.dryRun).toBe(false);
  });
});

describe('toMergeOptions', () => {
  it('should fill in case sensitivity when left to the host', () => {
    const options = toMergeOptions({ ...defaultConfig, merge: { ...defaultConfig.merge, caseSensitive: false } });

    expect(options.caseSensitive).toBe(false);
    expect(options.policy).toBe('NeverOverwrite');
    expect(typeof toMergeOptions(defaultConfig).caseSensitive).toBe('boolean');
  });
});

describe('resolveConfigPath', () => {
  it('should return provided path', async () => {
    const result = await resolveConfigPath('/custom/config.json');
    expect(result).toBe(path.resolve('/custom/config.json'));
  });
});
