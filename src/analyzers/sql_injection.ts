/**
 * @fileoverview Injection indicators in executed statements
 *
 * Each statement is scored by the signs of values concatenated into its
 * text rather than bound: keywords or comment syntax inside a string,
 * always-true conditions, literal strings in WHERE, quoted numbers and
 * inline LIKE patterns. Statements at or above `criticalRisk` make one
 * finding; those at or above `minRisk` but below it make another.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { thresholdValue } from '../severity/thresholds.js';
import { topLevelIndex } from '../sql/scan.js';
import { isKeywordToken, stringLiteralValue, type SqlToken } from '../sql/tokenizer.js';
import type { Finding, OperationTrace } from '../types.js';
import type { TraceAnalysisContext, TraceAnalyzer } from './types.js';

const SAFE_LITERALS: ReadonlySet<string> = new Set(
  z
    .array(z.string())
    .parse(JSON.parse(readFileSync(new URL('../../data/injection_safe_literals.json', import.meta.url), 'utf8'))),
);

const KEYWORDS_IN_STRING = /\bUNION\b|\b(?:OR|AND)\s+['"]?1['"]?\s*=\s*['"]?1\b/i;

export interface InjectionAssessment {
  readonly risk: number;
  readonly indicators: readonly string[];
}

// ============================================================================
// LITERAL CLASSIFICATION
// ============================================================================

/** Digits that are not an id, a date, a time, a decimal or a UUID. */
export function isSuspiciousNumeric(value: string): boolean {
  if (!/\d/.test(value)) return false;
  if (/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(value)) return false;
  if (/^\d{4}-\d{2}-\d{2}/.test(value) || /^\d{2}\/\d{2}\/\d{4}/.test(value)) return false;
  if (/^\d{2}:\d{2}(:\d{2})?$/.test(value)) return false;
  if (/^\d+\.\d+(\.\d+)?$/.test(value)) return false;
  return !/^\d{1,10}$/.test(value);
}

/** A WHERE literal that is neither a known status word nor a short lower-case word. */
export function isSuspiciousLiteral(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === '' || SAFE_LITERALS.has(normalized)) return false;
  return !(normalized.length <= 10 && /^[a-z]+$/.test(normalized));
}

function literalValue(token: SqlToken | undefined): string | undefined {
  if (token?.type === 'number') return token.value;
  if (token?.type === 'string') return stringLiteralValue(token);
  return undefined;
}

function hasTautology(tokens: readonly SqlToken[]): boolean {
  return tokens.some((token, index) => {
    if (!isKeywordToken(token, 'OR') && !isKeywordToken(token, 'AND')) return false;
    const left = literalValue(tokens[index + 1]);
    const operator = tokens[index + 2];
    return left !== undefined && operator?.value === '=' && left === literalValue(tokens[index + 3]);
  });
}

// ============================================================================
// SCORING
// ============================================================================

export function assessInjectionRisk(tokens: readonly SqlToken[]): InjectionAssessment {
  const where = topLevelIndex(tokens, 'WHERE');
  const strings: { token: SqlToken; value: string; index: number }[] = [];
  tokens.forEach((token, index) => {
    if (token.type === 'string') strings.push({ token, value: stringLiteralValue(token), index });
  });

  let risk = 0;
  const indicators: string[] = [];
  const flag = (weight: number, indicator: string): void => {
    risk += weight;
    indicators.push(indicator);
  };

  if (strings.some(({ value }) => KEYWORDS_IN_STRING.test(value)) || hasTautology(tokens)) {
    flag(3, 'SQL keywords or an always-true condition');
  }
  if (strings.some(({ value }) => value.includes('--') || value.includes('/*'))) {
    flag(2, 'comment syntax inside a string');
  }
  if (strings.some(({ token }) => token.value.slice(1, -1).includes(token.value.charAt(0).repeat(2)))) {
    flag(1, 'consecutive quotes');
  }
  if (strings.some(({ value }) => isSuspiciousNumeric(value))) {
    flag(1, 'numeric value in quotes');
  }
  if (strings.some(({ value, index }) => isKeywordToken(tokens[index - 1], 'LIKE') && /[%_]/.test(value))) {
    flag(1, 'LIKE pattern written inline');
  }
  const whereLiterals = where === -1 ? [] : strings.filter(({ value, index }) => index > where && isSuspiciousLiteral(value));
  if (whereLiterals.length >= 1) {
    flag(2, 'literal string in WHERE');
  }
  if (whereLiterals.length >= 2) {
    flag(3, 'several conditions on literal strings');
  }

  return { risk, indicators };
}

// ============================================================================
// ANALYZER
// ============================================================================

interface RiskBucket {
  readonly traces: OperationTrace[];
  readonly indicators: Set<string>;
  risk: number;
}

function toFinding(bucket: RiskBucket, critical: boolean): Finding {
  const count = bucket.traces.length;
  const queries = count === 1 ? '1 query' : `${count} queries`;
  const indicators = Array.from(bucket.indicators).join(', ');
  return {
    kind: 'sql_injection',
    title: critical ? `${queries} with strong injection indicators` : `${queries} with possible injection indicators`,
    narrative: `Indicators: ${indicators}. Bind values as parameters instead of writing them into the statement.`,
    metrics: { risk: bucket.risk, queries: count },
    relatedOperations: bucket.traces,
    suggestionParameters: { indicators },
  };
}

export const sqlInjectionAnalyzer: TraceAnalyzer = {
  kind: 'sql_injection',
  target: 'traces',

  analyze({ traces, thresholds, structure }: TraceAnalysisContext): Finding[] {
    const minRisk = thresholdValue(thresholds, 'sql_injection', 'minRisk');
    const criticalRisk = thresholdValue(thresholds, 'sql_injection', 'criticalRisk');
    const critical: RiskBucket = { traces: [], indicators: new Set(), risk: 0 };
    const high: RiskBucket = { traces: [], indicators: new Set(), risk: 0 };

    for (const trace of traces) {
      const assessment = assessInjectionRisk(structure.tokens(trace.text));
      if (assessment.risk < minRisk) continue;
      const bucket = assessment.risk >= criticalRisk ? critical : high;
      bucket.traces.push(trace);
      bucket.risk = Math.max(bucket.risk, assessment.risk);
      assessment.indicators.forEach((indicator) => bucket.indicators.add(indicator));
    }

    const findings: Finding[] = [];
    if (critical.traces.length > 0) findings.push(toFinding(critical, true));
    if (high.traces.length > 0) findings.push(toFinding(high, false));
    return findings;
  },
};
