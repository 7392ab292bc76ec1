import { thresholdValue } from '../severity/thresholds.js';
import type { Finding } from '../types.js';
import { formatMs, truncate } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

/**
 * Every operation slower than `thresholdMs` (strictly) yields a finding
 * keyed by its fingerprint; the assembler merges instances of one shape.
 */
export const slowQueryAnalyzer: TraceAnalyzer = {
  kind: 'slow_query',
  target: 'traces',

  analyze({ traces, thresholds, fingerprints }: TraceAnalysisContext): Finding[] {
    const thresholdMs = thresholdValue(thresholds, 'slow_query', 'thresholdMs');
    return traces
      .filter((trace) => trace.durationMs > thresholdMs)
      .map((trace): Finding => {
        const fingerprint = fingerprints.get(trace.text);
        return {
          kind: 'slow_query',
          title: `Slow query: ${truncate(fingerprint)}`,
          narrative: `The statement took ${formatMs(trace.durationMs)}, above the ${formatMs(thresholdMs)} threshold.`,
          metrics: { durationMs: trace.durationMs },
          relatedOperations: [trace],
          suggestionParameters: { fingerprint, durationMs: trace.durationMs },
        };
      });
  },
};
