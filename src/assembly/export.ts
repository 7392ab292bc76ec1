/**
 * @fileoverview Issue export
 *
 * Plain, JSON-safe records for reporting surfaces. Bound parameter values
 * are converted: bigint to string, Date to ISO text, binary to a byte
 * count, non-finite numbers to their text.
 */

import type { Issue, OperationParameters, OriginFrame, Severity } from '../types.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface PlainOperation {
  text: string;
  fingerprint: string;
  parameters: JsonValue[] | Record<string, JsonValue>;
  durationMs: number;
  rowCount: number | null;
  occurrences: number;
}

export interface PlainIssue {
  kind: string;
  title: string;
  narrative: string;
  severity: Severity;
  metrics: Record<string, number>;
  operations: PlainOperation[];
  suggestion: { code: string; description: string } | null;
  origin: { file: string; line: number; column?: number } | null;
}

export interface IssueSummary {
  total: number;
  bySeverity: Record<Severity, number>;
  byKind: Record<string, number>;
}

export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`;
  if (Array.isArray(value)) return value.map((item: unknown) => toJsonValue(item));
  if (value instanceof Map) {
    return Object.fromEntries(Array.from(value, ([key, item]: [unknown, unknown]) => [String(key), toJsonValue(item)]));
  }
  if (typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]: [string, unknown]) => [key, toJsonValue(item)]));
  }
  return String(value);
}

/** Positional parameters (keys 0..n-1) export as an array, anything else as an object. */
function plainParameters(parameters: OperationParameters): JsonValue[] | Record<string, JsonValue> {
  const keys = Array.from(parameters.keys());
  if (keys.every((key, index) => key === index)) {
    return Array.from(parameters.values(), (value) => toJsonValue(value));
  }
  return Object.fromEntries(Array.from(parameters, ([key, value]) => [String(key), toJsonValue(value)]));
}

function plainOrigin(origin: OriginFrame): { file: string; line: number; column?: number } {
  return origin.column === undefined
    ? { file: origin.file, line: origin.line }
    : { file: origin.file, line: origin.line, column: origin.column };
}

export function toPlainIssue(issue: Issue): PlainIssue {
  return {
    kind: issue.kind,
    title: issue.title,
    narrative: issue.narrative,
    severity: issue.severity,
    metrics: { ...issue.metrics },
    operations: issue.operations.map((operation) => ({
      text: operation.trace.text,
      fingerprint: operation.fingerprint,
      parameters: plainParameters(operation.trace.parameters),
      durationMs: operation.trace.durationMs,
      rowCount: operation.trace.rowCount ?? null,
      occurrences: operation.occurrences,
    })),
    suggestion: issue.suggestion ? { ...issue.suggestion } : null,
    origin: issue.origin ? plainOrigin(issue.origin) : null,
  };
}

export function exportIssues(issues: readonly Issue[]): PlainIssue[] {
  return issues.map(toPlainIssue);
}

export function summarizeIssues(issues: readonly Issue[]): IssueSummary {
  const summary: IssueSummary = {
    total: issues.length,
    bySeverity: { critical: 0, warning: 0, info: 0 },
    byKind: {},
  };
  for (const issue of issues) {
    summary.bySeverity[issue.severity] += 1;
    summary.byKind[issue.kind] = (summary.byKind[issue.kind] ?? 0) + 1;
  }
  return summary;
}
