/**
 * @fileoverview Unbounded result detection
 *
 * A SELECT with neither WHERE nor LIMIT that returned more than `maxRows`
 * rows loads a whole table. Aggregate-only projections (`COUNT(*)`) read
 * the table but return one row, so they are not reported. Traces without
 * a row count are skipped.
 */

import { thresholdValue } from '../severity/thresholds.js';
import type { Finding } from '../types.js';
import { formatMs } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

export const findAllAnalyzer: TraceAnalyzer = {
  kind: 'find_all',
  target: 'traces',

  analyze({ traces, thresholds, structure }: TraceAnalysisContext): Finding[] {
    const maxRows = thresholdValue(thresholds, 'find_all', 'maxRows');
    const findings: Finding[] = [];

    for (const trace of traces) {
      if (trace.rowCount === undefined || trace.rowCount <= maxRows) continue;
      const shape = structure.read(trace.text);
      if (shape.statement !== 'select' || shape.aggregateOnly || shape.hasWhere || shape.hasLimit) continue;

      const [table] = shape.tables;
      findings.push({
        kind: 'find_all',
        title: table ? `Unbounded query loads all rows of ${table}` : 'Unbounded query loads all rows',
        narrative:
          `A SELECT without WHERE or LIMIT returned ${trace.rowCount} rows in ${formatMs(trace.durationMs)}. ` +
          'The cost grows with the table.',
        metrics: { rows: trace.rowCount, durationMs: trace.durationMs },
        relatedOperations: [trace],
        suggestionParameters: { rows: trace.rowCount, ...(table ? { table } : {}) },
      });
    }
    return findings;
  },
};
