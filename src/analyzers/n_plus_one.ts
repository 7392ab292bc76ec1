/**
 * @fileoverview Repeated-shape (N+1) detection
 *
 * One finding per fingerprint executed more than `minOccurrences` times
 * in the pass; typically a query issued once per parent row.
 */

import { thresholdValue } from '../severity/thresholds.js';
import type { Finding } from '../types.js';
import { formatMs, groupByFingerprint } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

export const nPlusOneAnalyzer: TraceAnalyzer = {
  kind: 'n_plus_one',
  target: 'traces',

  analyze({ traces, thresholds, fingerprints }: TraceAnalysisContext): Finding[] {
    const minOccurrences = thresholdValue(thresholds, 'n_plus_one', 'minOccurrences');
    return groupByFingerprint(traces, fingerprints)
      .filter((group) => group.traces.length > minOccurrences)
      .map((group): Finding => {
        const count = group.traces.length;
        return {
          kind: 'n_plus_one',
          title: `N+1 query: same statement executed ${count} times`,
          narrative:
            `The statement "${group.fingerprint}" ran ${count} times (${formatMs(group.totalDurationMs)} total) ` +
            'with only its parameters changing. It is usually issued once per row of an earlier result.',
          metrics: { count, totalDurationMs: group.totalDurationMs },
          relatedOperations: group.traces,
          suggestionParameters: { fingerprint: group.fingerprint, count },
        };
      });
  },
};
