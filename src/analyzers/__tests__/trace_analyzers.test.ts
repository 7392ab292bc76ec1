/**
 * @fileoverview Tests for the trace analyzers
 */

import { describe, it, expect, vi } from 'vitest';
import { MetadataCache } from '../../cache/metadata_cache.js';
import { DiagnosticGateway } from '../../capabilities/gateway.js';
import type { DiagnosticCapabilities, ExecutionPlan, TableMetadata } from '../../capabilities/types.js';
import { CapabilityUnavailableError } from '../../core/errors.js';
import { defaultThresholdsFor, type Thresholds } from '../../severity/thresholds.js';
import { DEFAULT_VOCABULARY } from '../../source/sensitive_vocabulary.js';
import { FingerprintCache } from '../../sql/fingerprint.js';
import { SqlStructureReader } from '../../sql/structure.js';
import { createOperationTrace, type OperationTraceInput } from '../../trace/operation_trace.js';
import type { OperationTrace } from '../../types.js';
import { findAllAnalyzer } from '../find_all.js';
import { frequentQueryAnalyzer } from '../frequent_query.js';
import { ineffectiveLikeAnalyzer } from '../ineffective_like.js';
import { missingIndexAnalyzer } from '../missing_index.js';
import { nPlusOneAnalyzer } from '../n_plus_one.js';
import { orderByWithoutLimitAnalyzer } from '../order_by_without_limit.js';
import { strictModeAnalyzer, timezoneMismatchAnalyzer } from '../platform_settings.js';
import { slowQueryAnalyzer } from '../slow_query.js';
import type { AnalysisSettings, TraceAnalysisContext } from '../types.js';

interface ContextOptions {
  thresholds?: Thresholds;
  capabilities?: DiagnosticCapabilities;
  settings?: Partial<AnalysisSettings>;
  cache?: MetadataCache;
}

function contextFor(kind: string, traces: readonly OperationTrace[], options: ContextOptions = {}): TraceAnalysisContext {
  return {
    traces,
    thresholds: { ...defaultThresholdsFor(kind), ...options.thresholds },
    settings: { sensitivePatterns: DEFAULT_VOCABULARY.patterns, ...options.settings },
    signal: new AbortController().signal,
    gateway: new DiagnosticGateway(options.capabilities ?? {}),
    cache: options.cache ?? new MetadataCache(),
    fingerprints: new FingerprintCache(),
    structure: new SqlStructureReader(),
  };
}

function trace(input: OperationTraceInput): OperationTrace {
  return createOperationTrace(input);
}

function repeated(count: number, durationMs: number): OperationTrace[] {
  return Array.from({ length: count }, (_, index) =>
    trace({ text: `SELECT * FROM posts WHERE user_id = ${index + 1}`, durationMs }),
  );
}

describe('nPlusOneAnalyzer', () => {
  it('reports a shape executed more than minOccurrences times', async () => {
    const traces = repeated(6, 0.5);

    const findings = await nPlusOneAnalyzer.analyze(contextFor('n_plus_one', traces));

    expect(findings).toHaveLength(1);
    const [finding] = findings;
    expect(finding?.title).toBe('N+1 query: same statement executed 6 times');
    expect(finding?.narrative).toBe(
      'The statement "SELECT * FROM posts WHERE user_id = ?" ran 6 times (3ms total) with only its ' +
        'parameters changing. It is usually issued once per row of an earlier result.',
    );
    expect(finding?.metrics).toEqual({ count: 6, totalDurationMs: 3 });
    expect(finding?.relatedOperations).toHaveLength(6);
    expect(finding?.suggestionParameters).toEqual({ fingerprint: 'SELECT * FROM posts WHERE user_id = ?', count: 6 });
  });

  it('stays quiet at exactly minOccurrences executions', async () => {
    const findings = await nPlusOneAnalyzer.analyze(contextFor('n_plus_one', repeated(5, 0.5)));

    expect(findings).toEqual([]);
  });

  it('reads minOccurrences from the thresholds', async () => {
    const findings = await nPlusOneAnalyzer.analyze(
      contextFor('n_plus_one', repeated(3, 1), { thresholds: { minOccurrences: 2 } }),
    );

    expect(findings.map((finding) => finding.metrics.count)).toEqual([3]);
  });
});

describe('slowQueryAnalyzer', () => {
  it('reports operations strictly slower than thresholdMs', async () => {
    const traces = [
      trace({ text: 'SELECT * FROM users WHERE id = 1', durationMs: 150 }),
      trace({ text: 'SELECT * FROM users WHERE id = 2', durationMs: 100 }),
    ];

    const findings = await slowQueryAnalyzer.analyze(contextFor('slow_query', traces));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.title).toBe('Slow query: SELECT * FROM users WHERE id = ?');
    expect(findings[0]?.narrative).toBe('The statement took 150ms, above the 100ms threshold.');
    expect(findings[0]?.metrics).toEqual({ durationMs: 150 });
    expect(findings[0]?.relatedOperations).toEqual([traces[0]]);
  });
});

describe('findAllAnalyzer', () => {
  it('reports an unfiltered select that returned many rows', async () => {
    const traces = [trace({ text: 'SELECT * FROM users', durationMs: 12, rowCount: 500 })];

    const findings = await findAllAnalyzer.analyze(contextFor('find_all', traces));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.title).toBe('Unbounded query loads all rows of users');
    expect(findings[0]?.metrics).toEqual({ rows: 500, durationMs: 12 });
    expect(findings[0]?.suggestionParameters).toEqual({ rows: 500, table: 'users' });
  });

  it('ignores filtered, limited, aggregate, small and uncounted selects', async () => {
    const traces = [
      trace({ text: 'SELECT * FROM users WHERE active = 1', durationMs: 1, rowCount: 500 }),
      trace({ text: 'SELECT * FROM users LIMIT 1000', durationMs: 1, rowCount: 500 }),
      trace({ text: 'SELECT COUNT(*) FROM users', durationMs: 1, rowCount: 500 }),
      trace({ text: 'SELECT * FROM roles', durationMs: 1, rowCount: 99 }),
      trace({ text: 'SELECT * FROM groups', durationMs: 1 }),
    ];

    const findings = await findAllAnalyzer.analyze(contextFor('find_all', traces));

    expect(findings).toEqual([]);
  });
});

describe('orderByWithoutLimitAnalyzer', () => {
  it('reports a sorted select without a limit', async () => {
    const traces = [trace({ text: 'SELECT * FROM users ORDER BY name', durationMs: 4, rowCount: 200 })];

    const findings = await orderByWithoutLimitAnalyzer.analyze(contextFor('order_by_without_limit', traces));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.narrative).toBe('All 200 rows were sorted before being returned (4ms).');
    expect(findings[0]?.suggestionParameters).toEqual({ rows: 200, table: 'users' });
  });

  it('ignores limited or uncounted sorts', async () => {
    const traces = [
      trace({ text: 'SELECT * FROM users ORDER BY name LIMIT 10', durationMs: 4, rowCount: 10 }),
      trace({ text: 'SELECT * FROM users ORDER BY email', durationMs: 4 }),
    ];

    const findings = await orderByWithoutLimitAnalyzer.analyze(contextFor('order_by_without_limit', traces));

    expect(findings).toEqual([]);
  });
});

describe('ineffectiveLikeAnalyzer', () => {
  it('reports an inline leading wildcard', async () => {
    const traces = [trace({ text: "SELECT * FROM users WHERE name LIKE '%son'", durationMs: 2 })];

    const findings = await ineffectiveLikeAnalyzer.analyze(contextFor('ineffective_like', traces));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.narrative).toBe('A LIKE pattern starts with %, so no index can narrow the scan (2ms).');
    expect(findings[0]?.suggestionParameters).toEqual({ fingerprint: 'SELECT * FROM users WHERE name LIKE ?' });
  });

  it('counts bound patterns', async () => {
    const traces = [
      trace({ text: 'SELECT * FROM users WHERE name LIKE ? OR email LIKE ?', parameters: ['%a', '%b'], durationMs: 3 }),
    ];

    const findings = await ineffectiveLikeAnalyzer.analyze(contextFor('ineffective_like', traces));

    expect(findings[0]?.narrative).toBe('2 LIKE patterns start with %, so no index can narrow the scan (3ms).');
  });

  it('ignores trailing wildcards', async () => {
    const traces = [trace({ text: 'SELECT * FROM users WHERE name LIKE ?', parameters: ['son%'], durationMs: 2 })];

    expect(await ineffectiveLikeAnalyzer.analyze(contextFor('ineffective_like', traces))).toEqual([]);
  });
});

describe('frequentQueryAnalyzer', () => {
  it('reports shapes executed at least minExecutions times', async () => {
    const findings = await frequentQueryAnalyzer.analyze(contextFor('frequent_query', repeated(10, 1)));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.metrics).toEqual({ count: 10, totalDurationMs: 10 });
    expect(findings[0]?.title).toBe('Frequent query: SELECT * FROM posts WHERE user_id = ?');
  });

  it('stays quiet below minExecutions', async () => {
    expect(await frequentQueryAnalyzer.analyze(contextFor('frequent_query', repeated(9, 1)))).toEqual([]);
  });
});

describe('missingIndexAnalyzer', () => {
  const plan: ExecutionPlan = { steps: [{ table: 'orders', fullScan: true, rowsExamined: 5000 }] };
  const metadata: TableMetadata = {
    name: 'orders',
    rowCount: 5000,
    indexes: [{ name: 'PRIMARY', columns: ['id'] }],
  };

  it('explains slow selects and reports full scans', async () => {
    const explainPlan = vi.fn(async (): Promise<ExecutionPlan> => plan);
    const describeTable = vi.fn(async (): Promise<TableMetadata> => metadata);
    const traces = [trace({ text: "SELECT * FROM orders WHERE status = 'open'", durationMs: 80 })];

    const findings = await missingIndexAnalyzer.analyze(
      contextFor('missing_index', traces, { capabilities: { explainPlan, describeTable } }),
    );

    expect(explainPlan).toHaveBeenCalledTimes(1);
    expect(findings).toHaveLength(1);
    expect(findings[0]?.title).toBe('Missing index on orders');
    expect(findings[0]?.narrative).toBe(
      'The plan scans orders in full, examining 5000 rows (80ms). Existing indexes: PRIMARY.',
    );
    expect(findings[0]?.metrics).toEqual({ rowsScanned: 5000, durationMs: 80, fullScanSteps: 1 });
    expect(findings[0]?.suggestionParameters).toEqual({ rowsScanned: 5000, table: 'orders' });
  });

  it('explains only the slowest execution of a shape', async () => {
    const explainPlan = vi.fn(async (): Promise<ExecutionPlan> => plan);
    const traces = [
      trace({ text: 'SELECT * FROM orders WHERE id = 1', durationMs: 60 }),
      trace({ text: 'SELECT * FROM orders WHERE id = 2', durationMs: 90 }),
    ];

    await missingIndexAnalyzer.analyze(contextFor('missing_index', traces, { capabilities: { explainPlan } }));

    expect(explainPlan).toHaveBeenCalledTimes(1);
    expect(explainPlan.mock.calls[0]).toEqual([
      'SELECT * FROM orders WHERE id = 2',
      new Map(),
      expect.any(AbortSignal),
    ]);
  });

  it('does not explain operations below slowThresholdMs', async () => {
    const explainPlan = vi.fn(async (): Promise<ExecutionPlan> => plan);
    const traces = [trace({ text: 'SELECT * FROM orders', durationMs: 10 })];

    const findings = await missingIndexAnalyzer.analyze(
      contextFor('missing_index', traces, { capabilities: { explainPlan } }),
    );

    expect(findings).toEqual([]);
    expect(explainPlan).not.toHaveBeenCalled();
  });

  it('skips tables smaller than minTableRows', async () => {
    const traces = [trace({ text: 'SELECT * FROM orders WHERE total > 10', durationMs: 80 })];

    const findings = await missingIndexAnalyzer.analyze(
      contextFor('missing_index', traces, {
        thresholds: { minTableRows: 10000 },
        capabilities: { explainPlan: async () => plan, describeTable: async () => metadata },
      }),
    );

    expect(findings).toEqual([]);
  });

  it('describes each table once through the shared cache', async () => {
    const describeTable = vi.fn(async (): Promise<TableMetadata> => metadata);
    const cache = new MetadataCache();
    const traces = [
      trace({ text: 'SELECT * FROM orders WHERE total > 10', durationMs: 80 }),
      trace({ text: 'SELECT id FROM orders WHERE status = 1', durationMs: 70 }),
    ];

    const findings = await missingIndexAnalyzer.analyze(
      contextFor('missing_index', traces, { cache, capabilities: { explainPlan: async () => plan, describeTable } }),
    );

    expect(findings).toHaveLength(2);
    expect(describeTable).toHaveBeenCalledTimes(1);
    expect(cache.getStats().hits).toBe(1);
  });

  it('fails when the host cannot explain plans', async () => {
    const traces = [trace({ text: 'SELECT * FROM orders', durationMs: 80 })];

    await expect(missingIndexAnalyzer.analyze(contextFor('missing_index', traces))).rejects.toBeInstanceOf(
      CapabilityUnavailableError,
    );
  });
});

describe('timezoneMismatchAnalyzer', () => {
  it('reports differing zones', async () => {
    const findings = await timezoneMismatchAnalyzer.analyze(
      contextFor('timezone_mismatch', [], {
        settings: { applicationTimeZone: 'UTC' },
        capabilities: { fetchPlatformSetting: async () => 'Europe/Paris' },
      }),
    );

    expect(findings).toHaveLength(1);
    expect(findings[0]?.suggestionParameters).toEqual({ databaseTimeZone: 'Europe/Paris', applicationTimeZone: 'UTC' });
    expect(findings[0]?.relatedOperations).toEqual([]);
  });

  it('follows SYSTEM to the host zone and treats UTC aliases as equal', async () => {
    const settings: Record<string, string> = { time_zone: 'SYSTEM', system_time_zone: 'Etc/UTC' };
    const fetchPlatformSetting = vi.fn(async (name: string): Promise<string | null> => settings[name] ?? null);

    const findings = await timezoneMismatchAnalyzer.analyze(
      contextFor('timezone_mismatch', [], {
        settings: { applicationTimeZone: 'UTC' },
        capabilities: { fetchPlatformSetting },
      }),
    );

    expect(findings).toEqual([]);
    expect(fetchPlatformSetting.mock.calls.map(([name]) => name)).toEqual(['time_zone', 'system_time_zone']);
  });

  it('does nothing without an application time zone or a reported setting', async () => {
    const fetchPlatformSetting = vi.fn(async (): Promise<string | null> => null);

    expect(
      await timezoneMismatchAnalyzer.analyze(contextFor('timezone_mismatch', [], { capabilities: { fetchPlatformSetting } })),
    ).toEqual([]);
    expect(fetchPlatformSetting).not.toHaveBeenCalled();

    expect(
      await timezoneMismatchAnalyzer.analyze(
        contextFor('timezone_mismatch', [], {
          settings: { applicationTimeZone: 'UTC' },
          capabilities: { fetchPlatformSetting },
        }),
      ),
    ).toEqual([]);
  });
});

describe('strictModeAnalyzer', () => {
  async function analyzeMode(sqlMode: string | null) {
    return strictModeAnalyzer.analyze(
      contextFor('strict_mode_disabled', [], { capabilities: { fetchPlatformSetting: async () => sqlMode } }),
    );
  }

  it('reports a sql_mode without strict modes', async () => {
    const findings = await analyzeMode('NO_ENGINE_SUBSTITUTION');

    expect(findings).toHaveLength(1);
    expect(findings[0]?.metrics).toEqual({ missingModes: 1 });
    expect(findings[0]?.suggestionParameters).toEqual({ sqlMode: 'NO_ENGINE_SUBSTITUTION' });
  });

  it('accepts either strict mode in any case', async () => {
    expect(await analyzeMode('STRICT_TRANS_TABLES,NO_ZERO_DATE')).toEqual([]);
    expect(await analyzeMode('no_zero_date, strict_all_tables')).toEqual([]);
  });

  it('does nothing when the setting is not reported', async () => {
    expect(await analyzeMode(null)).toEqual([]);
  });
});
