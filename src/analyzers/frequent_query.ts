import { thresholdValue } from '../severity/thresholds.js';
import type { Finding } from '../types.js';
import { formatMs, groupByFingerprint, truncate } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

/**
 * Shapes executed at least `minExecutions` times. Overlaps with N+1; the
 * assembler keeps the N+1 issue when both fire on a shape.
 */
export const frequentQueryAnalyzer: TraceAnalyzer = {
  kind: 'frequent_query',
  target: 'traces',

  analyze({ traces, thresholds, fingerprints }: TraceAnalysisContext): Finding[] {
    const minExecutions = thresholdValue(thresholds, 'frequent_query', 'minExecutions');
    return groupByFingerprint(traces, fingerprints)
      .filter((group) => group.traces.length >= minExecutions)
      .map((group): Finding => ({
        kind: 'frequent_query',
        title: `Frequent query: ${truncate(group.fingerprint)}`,
        narrative:
          `Executed ${group.traces.length} times for ${formatMs(group.totalDurationMs)} in total. ` +
          'Its result may be cacheable for the unit of work.',
        metrics: { count: group.traces.length, totalDurationMs: group.totalDurationMs },
        relatedOperations: group.traces,
        suggestionParameters: { fingerprint: group.fingerprint, count: group.traces.length },
      }));
  },
};
