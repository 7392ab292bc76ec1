/**
 * @fileoverview Operation and issue deduplication
 */

import type { FingerprintCache } from '../sql/fingerprint.js';
import type { IssueOperation, OperationTrace } from '../types.js';

/** An issue operation whose occurrence count is still being accumulated. */
export interface DedupedOperation extends IssueOperation {
  occurrences: number;
}

/**
 * Collapse operations sharing a fingerprint onto the first one seen.
 * Later duplicates only raise the representative's occurrence count.
 */
export function dedupOperations(
  operations: readonly OperationTrace[],
  fingerprints: FingerprintCache,
): DedupedOperation[] {
  const byFingerprint = new Map<string, DedupedOperation>();
  for (const trace of operations) {
    const fingerprint = fingerprints.get(trace.text);
    const existing = byFingerprint.get(fingerprint);
    if (existing) {
      existing.occurrences += 1;
    } else {
      byFingerprint.set(fingerprint, { trace, fingerprint, occurrences: 1 });
    }
  }
  return Array.from(byFingerprint.values());
}

/** Fingerprints of issues of `dominant` kind. */
export function fingerprintsOfKind(
  issues: readonly { kind: string; operations: readonly IssueOperation[] }[],
  dominant: string,
): Set<string> {
  const covered = new Set<string>();
  for (const issue of issues) {
    if (issue.kind !== dominant) continue;
    for (const operation of issue.operations) covered.add(operation.fingerprint);
  }
  return covered;
}

/**
 * Kinds that yield to another kind reporting the same operations
 * (a frequent query that is also an N+1 is reported once, as the N+1).
 */
export const SUPERSEDED_BY: Readonly<Record<string, string>> = {
  frequent_query: 'n_plus_one',
};

export function isSuperseded(
  issue: { kind: string; operations: readonly IssueOperation[] },
  coveredByKind: ReadonlyMap<string, ReadonlySet<string>>,
): boolean {
  const dominant = SUPERSEDED_BY[issue.kind];
  if (dominant === undefined || issue.operations.length === 0) return false;
  const covered = coveredByKind.get(dominant);
  return covered !== undefined && issue.operations.every((operation) => covered.has(operation.fingerprint));
}
