import { countLeadingWildcardLikes } from '../sql/structure.js';
import type { Finding } from '../types.js';
import { formatMs } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

/**
 * LIKE patterns starting with `%`, inline or bound, defeat B-tree indexes.
 */
export const ineffectiveLikeAnalyzer: TraceAnalyzer = {
  kind: 'ineffective_like',
  target: 'traces',

  analyze({ traces, fingerprints, structure }: TraceAnalysisContext): Finding[] {
    const findings: Finding[] = [];
    for (const trace of traces) {
      const patterns = countLeadingWildcardLikes(trace.text, trace.parameters, structure.dialect);
      if (patterns === 0) continue;
      const fingerprint = fingerprints.get(trace.text);
      findings.push({
        kind: 'ineffective_like',
        title: 'LIKE with a leading wildcard',
        narrative:
          `${patterns === 1 ? 'A LIKE pattern starts' : `${patterns} LIKE patterns start`} with %, ` +
          `so no index can narrow the scan (${formatMs(trace.durationMs)}).`,
        metrics: { durationMs: trace.durationMs },
        relatedOperations: [trace],
        suggestionParameters: { fingerprint },
      });
    }
    return findings;
  },
};
