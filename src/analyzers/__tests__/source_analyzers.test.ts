/**
 * @fileoverview Tests for the source analyzers and the analyzer registry
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../core/errors.js';
import { DEFAULT_VOCABULARY } from '../../source/sensitive_vocabulary.js';
import { parseSourceUnit, type SourceUnit } from '../../source/parse.js';
import { createDefaultAnalyzerRegistry, DEFAULT_ANALYZERS } from '../index.js';
import { rawQueryInterpolationAnalyzer } from '../raw_query_interpolation.js';
import { AnalyzerRegistry } from '../registry.js';
import { sensitiveDataExposureAnalyzer } from '../sensitive_data_exposure.js';
import type { SourceAnalysisContext, TraceAnalyzer } from '../types.js';

function contextFor(units: readonly SourceUnit[], patterns = DEFAULT_VOCABULARY.patterns): SourceAnalysisContext {
  return {
    units,
    thresholds: {},
    settings: { sensitivePatterns: patterns },
    signal: new AbortController().signal,
  };
}

describe('sensitiveDataExposureAnalyzer', () => {
  it('reports sensitive fields a serialization method returns', async () => {
    const unit = parseSourceUnit(
      'src/user.ts',
      [
        'export class User {',
        '  private password: string;',
        '  private email: string;',
        '  constructor(private apiToken: string) {}',
        '  toJSON() {',
        '    return { email: this.email, password: this.password };',
        '  }',
        '}',
      ].join('\n'),
    );

    const findings = await sensitiveDataExposureAnalyzer.analyze(contextFor([unit]));

    expect(findings).toHaveLength(1);
    expect(findings[0]).toEqual({
      kind: 'sensitive_data_exposure',
      title: 'Sensitive data exposed by User.toJSON()',
      narrative: 'toJSON() includes password in its output.',
      metrics: { exposedFields: 1, wholeObject: 0 },
      relatedOperations: [],
      relatedOrigin: { file: 'src/user.ts', line: 5 },
      suggestionParameters: { className: 'User', methodName: 'toJSON', fields: 'password' },
    });
  });

  it('names every sensitive field when the whole object is serialized', async () => {
    const unit = parseSourceUnit(
      'src/client.ts',
      [
        'class ApiClient {',
        '  secretKey = "test-secret";',
        '  baseUrl = "http://localhost";',
        '  serialize() {',
        '    return JSON.stringify(this);',
        '  }',
        '}',
      ].join('\n'),
    );

    const findings = await sensitiveDataExposureAnalyzer.analyze(contextFor([unit]));

    expect(findings.map((finding) => finding.narrative)).toEqual([
      'serialize() serializes the whole object, including secretKey.',
    ]);
    expect(findings[0]?.metrics).toEqual({ exposedFields: 0, wholeObject: 1 });
  });

  it('ignores static fields, metadata fields and other methods', async () => {
    const unit = parseSourceUnit(
      'src/account.ts',
      [
        'class Account {',
        '  static password = "x";',
        '  passwordResetAt?: Date;',
        '  token = "t";',
        '  describe() {',
        '    return { token: this.token };',
        '  }',
        '  toJSON() {',
        '    return { passwordResetAt: this.passwordResetAt };',
        '  }',
        '}',
      ].join('\n'),
    );

    expect(await sensitiveDataExposureAnalyzer.analyze(contextFor([unit]))).toEqual([]);
  });

  it('uses the configured patterns', async () => {
    const unit = parseSourceUnit(
      'src/patient.ts',
      ['class Patient {', '  diagnosis = "";', '  toArray() {', '    return [this.diagnosis];', '  }', '}'].join('\n'),
    );

    const withDefaults = await sensitiveDataExposureAnalyzer.analyze(contextFor([unit]));
    const withExtra = await sensitiveDataExposureAnalyzer.analyze(
      contextFor([unit], [...DEFAULT_VOCABULARY.patterns, 'diagnosis']),
    );

    expect(withDefaults).toEqual([]);
    expect(withExtra.map((finding) => finding.title)).toEqual(['Sensitive data exposed by Patient.toArray()']);
  });
});

describe('rawQueryInterpolationAnalyzer', () => {
  it('reports one finding per interpolated call site', async () => {
    const unit = parseSourceUnit(
      'src/repo.ts',
      [
        'export async function find(db: Db, id: string) {',
        '  await db.query("SELECT * FROM users WHERE id = ?", [id]);',
        '  return db.query(`SELECT * FROM users WHERE id = ${id}`);',
        '}',
      ].join('\n'),
    );

    const findings = await rawQueryInterpolationAnalyzer.analyze(contextFor([unit]));

    expect(findings).toEqual([
      {
        kind: 'raw_query_interpolation',
        title: 'Interpolated query text passed to query()',
        narrative:
          'src/repo.ts:3 builds the statement for query() from runtime values. ' +
          'Values concatenated into SQL text are open to injection and defeat statement caching.',
        metrics: { interpolations: 1 },
        relatedOperations: [],
        relatedOrigin: { file: 'src/repo.ts', line: 3, column: 10 },
        suggestionParameters: { callee: 'query', line: 3 },
      },
    ]);
  });

  it('reports two interpolated calls on one line separately', async () => {
    const unit = parseSourceUnit(
      'src/repo.ts',
      'export const both = (db: Db, a: string, b: string) => [db.query(`SELECT ${a}`), db.query(`SELECT ${b}`)];',
    );

    const findings = await rawQueryInterpolationAnalyzer.analyze(contextFor([unit]));

    expect(findings.map((finding) => finding.relatedOrigin)).toEqual([
      { file: 'src/repo.ts', line: 1, column: 56 },
      { file: 'src/repo.ts', line: 1, column: 81 },
    ]);
  });
});

describe('AnalyzerRegistry', () => {
  const custom: TraceAnalyzer = { kind: 'custom_check', target: 'traces', analyze: () => [] };

  it('keeps registration order and splits by target', () => {
    const registry = createDefaultAnalyzerRegistry();

    expect(registry.getAll().map((analyzer) => analyzer.kind)).toEqual(DEFAULT_ANALYZERS.map((a) => a.kind));
    expect(registry.sourceAnalyzers().map((analyzer) => analyzer.kind)).toEqual([
      'sensitive_data_exposure',
      'raw_query_interpolation',
    ]);
    expect(registry.traceAnalyzers()).toHaveLength(DEFAULT_ANALYZERS.length - 2);
  });

  it('rejects a second analyzer of the same kind', () => {
    const registry = new AnalyzerRegistry();
    registry.register(custom);

    expect(() => registry.register(custom)).toThrow(ConfigurationError);
  });

  it('registers, looks up and unregisters by kind', () => {
    const registry = new AnalyzerRegistry();
    registry.register(custom);

    expect(registry.get('custom_check')).toBe(custom);
    registry.unregister('custom_check');
    expect(registry.has('custom_check')).toBe(false);
  });
});
