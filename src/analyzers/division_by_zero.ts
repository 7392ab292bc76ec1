/**
 * @fileoverview Division by a value that may be zero
 *
 * Flags `a / b` where `b` is a column, and `a / 0`. A non-zero numeric
 * divisor, a function-call divisor (`NULLIF(b, 0)`, `GREATEST(b, 1)`) and
 * a statement guarded by `CASE` are left alone. Bound parameters are not
 * inspected.
 */

import { hasKeyword, isPunctuation, qualifiedNameEndingAt, qualifiedNameStartingAt } from '../sql/scan.js';
import type { SqlToken } from '../sql/tokenizer.js';
import type { Finding } from '../types.js';
import { groupByFingerprint } from './shared.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

export interface UnguardedDivision {
  readonly dividend: string;
  readonly divisor: string;
}

function dividendBefore(tokens: readonly SqlToken[], index: number): string {
  const previous = tokens[index - 1];
  if (isPunctuation(previous, ')')) return '(...)';
  return qualifiedNameEndingAt(tokens, index - 1) ?? previous?.value ?? 'expression';
}

function divisorAfter(tokens: readonly SqlToken[], index: number): string | undefined {
  const next = tokens[index + 1];
  if (next?.type === 'number') {
    return Number(next.value) === 0 ? next.value : undefined;
  }
  const name = qualifiedNameStartingAt(tokens, index + 1);
  if (!name || isPunctuation(tokens[name.end + 1], '(')) return undefined;
  return name.name;
}

export function findUnguardedDivisions(tokens: readonly SqlToken[]): UnguardedDivision[] {
  if (hasKeyword(tokens, 'CASE')) return [];
  const divisions: UnguardedDivision[] = [];
  tokens.forEach((token, index) => {
    if (token.type !== 'operator' || token.value !== '/') return;
    const divisor = divisorAfter(tokens, index);
    if (divisor === undefined) return;
    divisions.push({ dividend: dividendBefore(tokens, index), divisor });
  });
  return divisions;
}

export const divisionByZeroAnalyzer: TraceAnalyzer = {
  kind: 'division_by_zero',
  target: 'traces',

  analyze({ traces, fingerprints, structure }: TraceAnalysisContext): Finding[] {
    const findings: Finding[] = [];
    for (const group of groupByFingerprint(traces, fingerprints)) {
      const seen = new Map<string, UnguardedDivision>();
      for (const trace of group.traces) {
        for (const division of findUnguardedDivisions(structure.tokens(trace.text))) {
          seen.set(`${division.dividend}/${division.divisor}`, division);
        }
      }
      const [first] = seen.values();
      if (!first) continue;

      const divisions = Array.from(seen.values());
      findings.push({
        kind: 'division_by_zero',
        title: 'Division by a value that may be zero',
        narrative:
          `${divisions.map((division) => `${division.dividend} / ${division.divisor}`).join(', ')} ` +
          'fails or returns NULL when the divisor is zero, depending on the platform.',
        metrics: { divisions: divisions.length },
        relatedOperations: group.traces,
        suggestionParameters: { dividend: first.dividend, divisor: first.divisor },
      });
    }
    return findings;
  },
};
