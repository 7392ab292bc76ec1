/**
 * @fileoverview Tests for the analyze command, its report formats and CLI errors
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { ConfigurationError, Errors } from '../../core/errors.js';
import { analyzeCommand } from '../commands/analyze.js';
import { CliError, classifyError, createError, formatError, getExitCode } from '../errors.js';
import { formatSummaryLine, hasIssuesAtOrAbove } from '../format.js';
import type { Issue } from '../../types.js';

describe('analyzeCommand', () => {
  let workspace: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'query-lens-cli-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await fs.rm(workspace, { recursive: true, force: true });
  });

  async function writeFile(name: string, content: unknown): Promise<string> {
    const filePath = path.join(workspace, name);
    await fs.writeFile(filePath, typeof content === 'string' ? content : JSON.stringify(content));
    return filePath;
  }

  function printed(): string {
    const [call] = logSpy.mock.calls;
    return call ? String(call[0]) : '';
  }

  const slowTrace = {
    text: 'SELECT * FROM users WHERE id = 1',
    durationMs: 150,
    origin: [{ file: 'src/repo.ts', line: 42 }],
  };

  it('prints a text report', async () => {
    const tracesPath = await writeFile('traces.json', [slowTrace]);

    const exitCode = await analyzeCommand({ args: [tracesPath] });

    expect(exitCode).toBe(0);
    expect(printed()).toBe(
      [
        'query-lens: 1 issue (1 critical, 0 warning, 0 info)',
        '',
        '[critical] slow_query: Slow query: SELECT * FROM users WHERE id = ?',
        '    The statement took 150ms, above the 100ms threshold.',
        '    at src/repo.ts:42',
        '    operation: SELECT * FROM users WHERE id = ?',
        '    suggestion: This query took 150ms. Inspect its plan and add an index or narrow the columns it reads.',
        '      EXPLAIN SELECT * FROM users WHERE id = ?',
      ].join('\n'),
    );
  });

  it('prints JSON and fails on a matching severity', async () => {
    const tracesPath = await writeFile('traces.json', { traces: [slowTrace, { sql: 'SELECT 1' }] });

    const exitCode = await analyzeCommand({ args: [tracesPath, '--json', '--fail-on', 'critical'] });

    expect(exitCode).toBe(1);
    const report: unknown = JSON.parse(printed());
    expect(report).toMatchObject({
      summary: { total: 1, bySeverity: { critical: 1, warning: 0, info: 0 }, byKind: { slow_query: 1 } },
      notes: [],
      rejected: [{ index: 1, reason: 'Validation failed for durationMs: expected number, got missing' }],
    });
  });

  it('passes --fail-on when nothing reaches the severity', async () => {
    const tracesPath = await writeFile('traces.json', [{ text: 'SELECT 1', durationMs: 2 }]);

    expect(await analyzeCommand({ args: [tracesPath, '--fail-on', 'info'] })).toBe(0);
    expect(printed()).toBe('query-lens: 0 issues (0 critical, 0 warning, 0 info)');
  });

  it('scans source files given with --source', async () => {
    const tracesPath = await writeFile('traces.json', []);
    const sourcePath = await writeFile(
      'repo.ts',
      'export function find(db: Db, id: string) {\n  return db.query(`SELECT * FROM users WHERE id = ${id}`);\n}\n',
    );

    await analyzeCommand({ args: [tracesPath, '--source', sourcePath, '--json'] });

    const report: unknown = JSON.parse(printed());
    expect(report).toMatchObject({
      issues: [{ kind: 'raw_query_interpolation', severity: 'critical', origin: { file: sourcePath, line: 2 } }],
    });
  });

  it('applies thresholds from a configuration file', async () => {
    const tracesPath = await writeFile('traces.json', [{ text: 'SELECT * FROM users WHERE id = 1', durationMs: 50 }]);
    const configPath = await writeFile('query-lens.yaml', 'analyzers:\n  slow_query:\n    thresholds:\n      thresholdMs: 20\n');

    await analyzeCommand({ args: [tracesPath, '--config', configPath, '--json'] });

    expect(JSON.parse(printed())).toMatchObject({ summary: { total: 1, byKind: { slow_query: 1 } } });
  });

  it('rejects a missing trace file argument and an unknown severity', async () => {
    await expect(analyzeCommand({ args: [] })).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    await expect(analyzeCommand({ args: ['traces.json', '--fail-on', 'fatal'] })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
      message: '--fail-on must be one of critical, warning, info, got fatal',
    });
  });

  it('reports unreadable and unparseable inputs', async () => {
    await expect(analyzeCommand({ args: [path.join(workspace, 'absent.json')] })).rejects.toMatchObject({
      code: 'INPUT_UNREADABLE',
    });

    const brokenPath = await writeFile('broken.json', '[{');
    const error: unknown = await analyzeCommand({ args: [brokenPath] }).catch((caught: unknown) => caught);
    expect(classifyError(error).code).toBe('INVALID_INPUT');
  });

  it('reports a cancelled pass', async () => {
    const tracesPath = await writeFile('traces.json', [slowTrace]);
    const controller = new AbortController();
    controller.abort();

    await expect(analyzeCommand({ args: [tracesPath], signal: controller.signal })).rejects.toMatchObject({
      code: 'ANALYSIS_NOT_PERFORMED',
      details: { reason: 'aborted' },
    });
  });
});

describe('CLI errors', () => {
  it('classifies library errors', () => {
    const config = classifyError(Errors.config('analyzers.x', 'no analyzer with this kind is registered'));
    expect(config.code).toBe('INVALID_CONFIG');
    expect(config.details).toEqual({ configKey: 'analyzers.x' });
    expect(getExitCode(config)).toBe(5);

    expect(classifyError(Errors.parse('traces.json', 'Unexpected end')).code).toBe('INVALID_INPUT');
    expect(classifyError(Errors.timeout(5)).code).toBe('INTERNAL');
    expect(classifyError(new ConfigurationError('k', 'm'))).toBeInstanceOf(CliError);
  });

  it('classifies argument parser errors', () => {
    const error = Object.assign(new TypeError("Unknown option '--nope'"), { code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION' });

    expect(classifyError(error).code).toBe('INVALID_ARGUMENT');
    expect(getExitCode(classifyError(error))).toBe(2);
  });

  it('formats errors as text and as JSON', () => {
    const error = createError('INPUT_UNREADABLE', 'Cannot read traces.json', { path: 'traces.json' });

    expect(formatError(error, false)).toBe(
      'Error [INPUT_UNREADABLE]: Cannot read traces.json\n\nSuggestion: Check that the file exists and is readable.',
    );
    expect(JSON.parse(formatError(error, true))).toEqual({
      error: {
        code: 'INPUT_UNREADABLE',
        message: 'Cannot read traces.json',
        suggestion: 'Check that the file exists and is readable.',
        details: { path: 'traces.json' },
      },
    });
  });
});

describe('report helpers', () => {
  it('pluralizes the summary line', () => {
    expect(
      formatSummaryLine({ total: 1, bySeverity: { critical: 0, warning: 1, info: 0 }, byKind: { n_plus_one: 1 } }),
    ).toBe('query-lens: 1 issue (0 critical, 1 warning, 0 info)');
  });

  it('compares severities by rank', () => {
    const warning: Issue = {
      kind: 'n_plus_one',
      title: 't',
      narrative: 'n',
      severity: 'warning',
      metrics: {},
      operations: [],
    };

    expect(hasIssuesAtOrAbove([warning], 'info')).toBe(true);
    expect(hasIssuesAtOrAbove([warning], 'warning')).toBe(true);
    expect(hasIssuesAtOrAbove([warning], 'critical')).toBe(false);
  });
});
