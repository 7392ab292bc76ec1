/**
 * @fileoverview LIMIT applied to a fetch-joined collection
 *
 * When a SELECT reads columns of two or more joined tables and carries a
 * LIMIT, the limit counts joined rows, not parent entities. A parent whose
 * collection spans several rows comes back with part of its collection.
 */

import { isIdentifier, isPunctuation, topLevelIndex } from '../sql/scan.js';
import type { SqlToken } from '../sql/tokenizer.js';
import type { Finding } from '../types.js';
import { groupByFingerprint } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

/** Distinct table qualifiers (`o` in `o.total`, `o.*`) in the projection. */
export function projectedQualifiers(tokens: readonly SqlToken[]): string[] {
  const select = topLevelIndex(tokens, 'SELECT');
  const from = topLevelIndex(tokens, 'FROM');
  if (select === -1 || from <= select) return [];

  const qualifiers: string[] = [];
  for (let i = select + 1; i < from; i += 1) {
    const token = tokens[i];
    if (!isIdentifier(token) || !isPunctuation(tokens[i + 1], '.') || isPunctuation(tokens[i - 1], '.')) continue;
    if (!qualifiers.includes(token.value)) qualifiers.push(token.value);
  }
  return qualifiers;
}

export const limitWithCollectionJoinAnalyzer: TraceAnalyzer = {
  kind: 'limit_with_collection_join',
  target: 'traces',

  analyze({ traces, fingerprints, structure }: TraceAnalysisContext): Finding[] {
    const findings: Finding[] = [];

    for (const group of groupByFingerprint(traces, fingerprints)) {
      const [first] = group.traces;
      if (!first) continue;
      const shape = structure.read(first.text);
      if (shape.statement !== 'select' || !shape.hasLimit) continue;
      const tokens = structure.tokens(first.text);
      if (topLevelIndex(tokens, 'JOIN') === -1) continue;
      const qualifiers = projectedQualifiers(tokens);
      if (qualifiers.length < 2) continue;

      const [table = 'the parent table'] = shape.tables;
      findings.push({
        kind: 'limit_with_collection_join',
        title: 'LIMIT applied to a joined collection',
        narrative:
          `The query selects from ${qualifiers.join(', ')} and limits the joined rows. ` +
          `Rows of ${table} whose collections span several rows are returned with part of their collection.`,
        metrics: { joinedTables: qualifiers.length },
        relatedOperations: group.traces,
        suggestionParameters: { table },
      });
    }
    return findings;
  },
};
