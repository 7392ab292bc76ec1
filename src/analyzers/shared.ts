/**
 * @fileoverview Helpers shared by the trace analyzers
 */

import type { FingerprintCache } from '../sql/fingerprint.js';
import type { OperationTrace } from '../types.js';

export interface TraceGroup {
  readonly fingerprint: string;
  readonly traces: OperationTrace[];
  totalDurationMs: number;
}

/** Traces grouped by fingerprint, groups in first-seen order. */
export function groupByFingerprint(
  traces: readonly OperationTrace[],
  fingerprints: FingerprintCache,
): TraceGroup[] {
  const groups = new Map<string, TraceGroup>();
  for (const trace of traces) {
    const fingerprint = fingerprints.get(trace.text);
    const group = groups.get(fingerprint) ?? { fingerprint, traces: [], totalDurationMs: 0 };
    group.traces.push(trace);
    group.totalDurationMs += trace.durationMs;
    groups.set(fingerprint, group);
  }
  return Array.from(groups.values());
}

export function formatMs(ms: number): string {
  return `${Math.round(ms * 100) / 100}ms`;
}

/** Statement text shortened for titles. */
export function truncate(text: string, max = 80): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`;
}
