import type { Finding } from '../types.js';
import { formatMs } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

/**
 * SELECT ... ORDER BY with no LIMIT sorts the entire result. Reported only
 * when the row count is known; severity decides whether it matters.
 */
export const orderByWithoutLimitAnalyzer: TraceAnalyzer = {
  kind: 'order_by_without_limit',
  target: 'traces',

  analyze({ traces, structure }: TraceAnalysisContext): Finding[] {
    const findings: Finding[] = [];
    for (const trace of traces) {
      if (trace.rowCount === undefined) continue;
      const shape = structure.read(trace.text);
      if (shape.statement !== 'select' || !shape.hasOrderBy || shape.hasLimit) continue;

      const [table] = shape.tables;
      findings.push({
        kind: 'order_by_without_limit',
        title: 'ORDER BY without LIMIT',
        narrative: `All ${trace.rowCount} rows were sorted before being returned (${formatMs(trace.durationMs)}).`,
        metrics: { rows: trace.rowCount, durationMs: trace.durationMs },
        relatedOperations: [trace],
        suggestionParameters: { rows: trace.rowCount, ...(table ? { table } : {}) },
      });
    }
    return findings;
  },
};
