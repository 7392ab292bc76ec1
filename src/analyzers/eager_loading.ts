/**
 * @fileoverview Excessive JOINs in one statement
 *
 * Eagerly loading many relations in one query multiplies the rows the
 * database returns. Every JOIN keyword counts, whatever its type.
 */

import { thresholdValue } from '../severity/thresholds.js';
import { countKeyword } from '../sql/scan.js';
import type { Finding } from '../types.js';
import { groupByFingerprint, truncate } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

export const eagerLoadingAnalyzer: TraceAnalyzer = {
  kind: 'eager_loading',
  target: 'traces',

  analyze({ traces, thresholds, fingerprints, structure }: TraceAnalysisContext): Finding[] {
    const minJoins = thresholdValue(thresholds, 'eager_loading', 'minJoins');
    const findings: Finding[] = [];

    for (const group of groupByFingerprint(traces, fingerprints)) {
      const [first] = group.traces;
      if (!first) continue;
      const joins = countKeyword(structure.tokens(first.text), 'JOIN');
      if (joins < minJoins) continue;

      findings.push({
        kind: 'eager_loading',
        title: `${joins} JOINs in one query`,
        narrative:
          `${truncate(group.fingerprint)} joins ${joins} tables. Each joined collection multiplies the ` +
          'rows returned and hydrated.',
        metrics: { joins },
        relatedOperations: group.traces,
        suggestionParameters: { joins },
      });
    }
    return findings;
  },
};
