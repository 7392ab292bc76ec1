/**
 * @fileoverview NULL compared with `=`, `!=` or `<>`
 *
 * `x = NULL` is never true, so the condition silently matches no rows.
 * Assignments (`SET x = NULL`, `ON DUPLICATE KEY UPDATE x = NULL`) are
 * not comparisons and are skipped. One finding per statement shape.
 */

import { qualifiedNameEndingAt } from '../sql/scan.js';
import { isKeywordToken, type SqlToken } from '../sql/tokenizer.js';
import type { Finding } from '../types.js';
import { groupByFingerprint } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

const COMPARISONS = new Set(['=', '!=', '<>']);
const ASSIGNMENT_STARTS = ['SET', 'UPDATE'];
const CONDITION_STARTS = ['WHERE', 'ON', 'HAVING', 'WHEN', 'SELECT'];

export interface NullComparison {
  readonly field: string;
  readonly operator: string;
  readonly correction: string;
}

export function findNullComparisons(tokens: readonly SqlToken[]): NullComparison[] {
  const comparisons: NullComparison[] = [];
  let assigning = false;

  tokens.forEach((token, index) => {
    if (ASSIGNMENT_STARTS.some((keyword) => isKeywordToken(token, keyword))) assigning = true;
    if (CONDITION_STARTS.some((keyword) => isKeywordToken(token, keyword))) assigning = false;
    if (token.type !== 'operator' || !COMPARISONS.has(token.value)) return;
    if (!isKeywordToken(tokens[index + 1], 'NULL')) return;
    if (token.value === '=' && assigning) return;

    const field = qualifiedNameEndingAt(tokens, index - 1) ?? 'expression';
    comparisons.push({
      field,
      operator: token.value,
      correction: token.value === '=' ? `${field} IS NULL` : `${field} IS NOT NULL`,
    });
  });
  return comparisons;
}

export const nullComparisonAnalyzer: TraceAnalyzer = {
  kind: 'null_comparison',
  target: 'traces',

  analyze({ traces, fingerprints, structure }: TraceAnalysisContext): Finding[] {
    const findings: Finding[] = [];
    for (const group of groupByFingerprint(traces, fingerprints)) {
      const seen = new Map<string, NullComparison>();
      for (const trace of group.traces) {
        for (const comparison of findNullComparisons(structure.tokens(trace.text))) {
          seen.set(`${comparison.field} ${comparison.operator}`, comparison);
        }
      }
      if (seen.size === 0) continue;

      const comparisons = Array.from(seen.values());
      const written = comparisons.map((comparison) => `${comparison.field} ${comparison.operator} NULL`).join(', ');
      const corrections = comparisons.map((comparison) => comparison.correction).join(', ');
      findings.push({
        kind: 'null_comparison',
        title: 'Comparison with NULL is never true',
        narrative: `${written} matches no rows in SQL. Use ${corrections}.`,
        metrics: { comparisons: comparisons.length },
        relatedOperations: group.traces,
        suggestionParameters: { incorrect: written, correct: corrections },
      });
    }
    return findings;
  },
};
