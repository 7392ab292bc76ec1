/**
 * @fileoverview Tests for configuration validation, resolution and loading
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createDefaultAnalyzerRegistry } from '../../analyzers/index.js';
import { ConfigurationError } from '../../core/errors.js';
import { DEFAULT_VOCABULARY } from '../../source/sensitive_vocabulary.js';
import { loadConfigFile, parseAnalysisConfig, resolveAnalysisConfig } from '../analysis_config.js';

const registry = createDefaultAnalyzerRegistry();

function resolve(raw: unknown) {
  return resolveAnalysisConfig(parseAnalysisConfig(raw), registry);
}

describe('parseAnalysisConfig', () => {
  it('treats a missing configuration as empty', () => {
    expect(parseAnalysisConfig(undefined)).toEqual({});
    expect(parseAnalysisConfig(null)).toEqual({});
  });

  it.each([
    {
      raw: { analyzers: { slow_query: { thresholds: { thresholdMs: -1 } } } },
      message: 'Configuration error for analyzers.slow_query.thresholds.thresholdMs: threshold must not be negative',
    },
    {
      raw: { analyzers: { slow_query: { thresholds: { thresholdMs: 'fast' } } } },
      message: 'Configuration error for analyzers.slow_query.thresholds.thresholdMs: threshold must be a number',
    },
    {
      raw: { analyzers: { slow_query: { thresholds: { thresholdMs: Number.POSITIVE_INFINITY } } } },
      message: 'Configuration error for analyzers.slow_query.thresholds.thresholdMs: threshold must be finite',
    },
    {
      raw: { capabilityTimeoutMs: 0 },
      message: 'Configuration error for capabilityTimeoutMs: capabilityTimeoutMs must be positive',
    },
  ])('rejects $raw', ({ raw, message }) => {
    expect(() => parseAnalysisConfig(raw)).toThrow(ConfigurationError);
    expect(() => parseAnalysisConfig(raw)).toThrow(message);
  });

  it('rejects unknown top-level keys', () => {
    expect(() => parseAnalysisConfig({ thresholdz: {} })).toThrow(ConfigurationError);
  });
});

describe('resolveAnalysisConfig', () => {
  it('fills in defaults for every registered analyzer', () => {
    const resolved = resolve({});

    expect(resolved.disabled.size).toBe(0);
    expect(resolved.capabilityTimeoutMs).toBe(5000);
    expect(resolved.dialect).toBe('mysql');
    expect(resolved.thresholds.get('slow_query')).toEqual({
      thresholdMs: 100,
      suppressDurationMs: 10,
      warningDurationMs: 10,
      criticalDurationMs: 100,
    });
    expect(resolved.settings).toEqual({ sensitivePatterns: DEFAULT_VOCABULARY.patterns });
  });

  it('merges configured thresholds over the defaults', () => {
    const resolved = resolve({ analyzers: { n_plus_one: { thresholds: { minOccurrences: 3 } } } });

    expect(resolved.thresholds.get('n_plus_one')?.minOccurrences).toBe(3);
    expect(resolved.thresholds.get('n_plus_one')?.suppressCount).toBe(3);
    expect(resolved.thresholds.get('n_plus_one')?.criticalCount).toBe(100);
  });

  it('collects disabled analyzers and settings', () => {
    const resolved = resolve({
      analyzers: { missing_index: { enabled: false }, slow_query: { enabled: true } },
      applicationTimeZone: 'Europe/Paris',
      sensitiveFields: ['apiSecretKey'],
      capabilityTimeoutMs: 250,
      dialect: 'postgresql',
    });

    expect(Array.from(resolved.disabled)).toEqual(['missing_index']);
    expect(resolved.settings.applicationTimeZone).toBe('Europe/Paris');
    expect(resolved.settings.sensitivePatterns.at(-1)).toBe('api_secret_key');
    expect(resolved.capabilityTimeoutMs).toBe(250);
    expect(resolved.dialect).toBe('postgresql');
  });

  it('rejects unknown analyzer kinds', () => {
    expect(() => resolve({ analyzers: { n_plus_two: { enabled: false } } })).toThrow(
      'Configuration error for analyzers.n_plus_two: no analyzer with this kind is registered',
    );
  });

  it('rejects unknown threshold names and lists the accepted ones', () => {
    expect(() => resolve({ analyzers: { slow_query: { thresholds: { maxMs: 5 } } } })).toThrow(
      'Configuration error for analyzers.slow_query.thresholds.maxMs: unknown threshold ' +
        '(accepted: thresholdMs, suppressDurationMs, warningDurationMs, criticalDurationMs)',
    );
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'query-lens-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads YAML', async () => {
    const file = path.join(dir, 'query-lens.yaml');
    await fs.writeFile(
      file,
      ['analyzers:', '  n_plus_one:', '    thresholds: { minOccurrences: 3 }', 'applicationTimeZone: UTC', ''].join('\n'),
    );

    await expect(loadConfigFile(file)).resolves.toEqual({
      analyzers: { n_plus_one: { thresholds: { minOccurrences: 3 } } },
      applicationTimeZone: 'UTC',
    });
  });

  it('reads JSON', async () => {
    const file = path.join(dir, 'query-lens.json');
    await fs.writeFile(file, JSON.stringify({ capabilityTimeoutMs: 1000 }));

    await expect(loadConfigFile(file)).resolves.toEqual({ capabilityTimeoutMs: 1000 });
  });

  it('reports unreadable and unparseable files as configuration errors', async () => {
    const broken = path.join(dir, 'broken.yaml');
    await fs.writeFile(broken, 'analyzers: [unclosed\n');

    await expect(loadConfigFile(path.join(dir, 'missing.yaml'))).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadConfigFile(broken)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('validates the parsed content', async () => {
    const file = path.join(dir, 'query-lens.yaml');
    await fs.writeFile(file, 'capabilityTimeoutMs: -5\n');

    await expect(loadConfigFile(file)).rejects.toThrow(
      'Configuration error for capabilityTimeoutMs: capabilityTimeoutMs must be positive',
    );
  });
});
