import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigError } from '../qc/errors.js';
import { ConfigValidationError, loadConfig, mergeWithDefaults, resolveQcSettings } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('Config loader', () => {
  const testDir = resolve(process.cwd(), 'tmp/config-test');

  function recordingLogger() {
    const warnings: string[] = [];
    return { warnings, logger: { debug() {}, info() {}, warn: (m: string) => warnings.push(m), error() {} } };
  }

  async function writeConfig(name: string, yaml: string): Promise<string> {
    const path = resolve(testDir, name);
    await writeFile(path, yaml);
    return path;
  }

  beforeAll(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true });
    delete process.env.QC_TEST_OUT;
  });

  it('returns defaults when the file is missing', async () => {
    const { warnings, logger } = recordingLogger();
    const config = await loadConfig({ configPath: resolve(testDir, 'absent.yaml'), logger });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([`Config file not found at ${resolve(testDir, 'absent.yaml')}, using defaults`]);
  });

  it('merges the file over defaults and substitutes environment variables', async () => {
    process.env.QC_TEST_OUT = '/data/qc';
    const path = await writeConfig(
      'env.yaml',
      [
        'server:',
        '  port: 4000',
        '  host: "${QC_TEST_UNSET}"',
        'qc:',
        '  backgroundAnalyte: "${QC_TEST_BG:-Blank}"',
        '  outputDir: ${QC_TEST_OUT}',
        '  standardAnalytes: [IgG, Tet]',
        '  blocks:',
        '    strategy: next-marker',
        '',
      ].join('\n')
    );
    const { warnings, logger } = recordingLogger();
    const config = await loadConfig({ configPath: path, logger });

    expect(config.server.port).toBe(4000);
    expect(config.server.host).toBe('');
    expect(config.server.cors).toEqual({ enabled: true, origins: ['*'] });
    expect(config.qc.backgroundAnalyte).toBe('Blank');
    expect(config.qc.outputDir).toBe('/data/qc');
    expect(config.qc.standardAnalytes).toEqual(['IgG', 'Tet']);
    expect(config.qc.beadThreshold).toBe(50);
    expect(config.qc.blocks.strategy).toBe('next-marker');
    expect(config.qc.blocks.mfiMarker).toBe('Median');
    expect(warnings).toEqual(['Environment variable QC_TEST_UNSET is not set and has no default']);
  });

  it('rejects out-of-range values with their path', async () => {
    const path = await writeConfig('bad.yaml', 'qc:\n  beadThreshold: -1\n');
    await expect(loadConfig({ configPath: path })).rejects.toMatchObject({
      name: 'ConfigValidationError',
      path: 'qc.beadThreshold',
      value: -1,
    });
  });

  it('requires a well count for the fixed-count strategy', async () => {
    const path = await writeConfig('fixed.yaml', 'qc:\n  blocks:\n    strategy: fixed-count\n');
    await expect(loadConfig({ configPath: path })).rejects.toThrow(ConfigValidationError);
  });

  it('rejects an invalid count marker pattern', async () => {
    const path = await writeConfig('regex.yaml', 'qc:\n  blocks:\n    countMarker: "DataType.*(Count"\n');
    await expect(loadConfig({ configPath: path })).rejects.toThrow(/countMarker is not a valid regular expression/);
  });

  it('skips validation when asked', async () => {
    const path = await writeConfig('unchecked.yaml', 'qc:\n  rSquaredThreshold: 2\n');
    const config = await loadConfig({ configPath: path, validate: false });
    expect(config.qc.rSquaredThreshold).toBe(2);
  });
});

describe('resolveQcSettings', () => {
  const config = mergeWithDefaults({ qc: { backgroundAnalyte: 'Blank', standardAnalytes: ['IgG'] } });

  it('applies overrides on top of the configuration', () => {
    const settings = resolveQcSettings(config, { beadThreshold: 35, standardAnalytes: ['Tet'] });
    expect(settings.beadThreshold).toBe(35);
    expect(settings.standardAnalytes).toEqual(['Tet']);
    expect(settings.backgroundAnalyte).toBe('Blank');
    expect(settings.rSquaredThreshold).toBe(0.9);
  });

  it('validates overrides', () => {
    expect(() => resolveQcSettings(config, { rSquaredThreshold: 1 })).toThrow(ConfigValidationError);
  });

  it('requires a background analyte', () => {
    expect(() => resolveQcSettings(mergeWithDefaults({}))).toThrow(ConfigError);
  });
});
