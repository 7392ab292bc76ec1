/**
 * @fileoverview Issue assembly
 *
 * Findings become issues in six steps:
 *
 * 1. Suppressed findings are dropped.
 * 2. Each finding's operations are deduplicated by fingerprint.
 * 3. Findings of one kind with the same ordered fingerprint list merge
 *    (findings without operations merge on kind, origin and title).
 *    `count` and `totalDurationMs` add up; other metrics keep the maximum.
 * 4. Issues superseded by a dominant kind on the same operations drop.
 * 5. Severity is computed on the merged metrics; suggestion and origin
 *    are attached.
 * 6. Issues are ranked Critical, Warning, Info, ties in first-seen order.
 */

import type { SeverityCalculator } from '../severity/severity_calculator.js';
import { FingerprintCache } from '../sql/fingerprint.js';
import type { SuggestionProvider } from '../suggestions/types.js';
import { logWarning } from '../telemetry/logger.js';
import { primaryFrame } from '../trace/operation_trace.js';
import {
  SEVERITY_RANK,
  type Finding,
  type FindingMetrics,
  type Issue,
  type IssueOperation,
  type OriginFrame,
  type Suggestion,
  type SuggestionParameters,
} from '../types.js';
import { SUPERSEDED_BY, dedupOperations, fingerprintsOfKind, isSuperseded, type DedupedOperation } from './deduplicator.js';

const SUMMED_METRICS = new Set(['count', 'totalDurationMs']);

interface MergedFinding {
  readonly kind: string;
  readonly title: string;
  readonly narrative: string;
  metrics: Record<string, number>;
  readonly operations: DedupedOperation[];
  readonly origin?: OriginFrame;
  readonly suggestionParameters?: SuggestionParameters;
}

export interface AssemblerOptions {
  severity: SeverityCalculator;
  suggestions?: SuggestionProvider;
  fingerprints?: FingerprintCache;
}

function mergeKey(finding: Finding, operations: readonly IssueOperation[]): string {
  if (operations.length > 0) {
    return `${finding.kind}\u0000${operations.map((operation) => operation.fingerprint).join('\u0001')}`;
  }
  const frame = finding.relatedOrigin;
  const origin = frame ? `${frame.file}:${frame.line}:${frame.column ?? ''}` : '';
  return `${finding.kind}\u0000${origin}\u0000${finding.title}`;
}

export function mergeMetrics(into: FindingMetrics, from: FindingMetrics): Record<string, number> {
  const merged: Record<string, number> = { ...into };
  for (const [name, value] of Object.entries(from)) {
    const current = merged[name];
    if (current === undefined) {
      merged[name] = value;
    } else {
      merged[name] = SUMMED_METRICS.has(name) ? current + value : Math.max(current, value);
    }
  }
  return merged;
}

/** Suggestion parameters refreshed with the merged value of any metric they repeat. */
function refreshParameters(parameters: SuggestionParameters, metrics: FindingMetrics): SuggestionParameters {
  const refreshed: Record<string, string | number> = { ...parameters };
  for (const name of Object.keys(parameters)) {
    const value = metrics[name];
    if (value !== undefined) refreshed[name] = value;
  }
  return refreshed;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value) && !(value instanceof Map)) {
    Object.values(value).forEach((nested: unknown) => deepFreeze(nested));
    Object.freeze(value);
  }
  return value;
}

export class IssueAssembler {
  private readonly severity: SeverityCalculator;
  private readonly suggestions?: SuggestionProvider;
  private readonly fingerprints: FingerprintCache;

  constructor(options: AssemblerOptions) {
    this.severity = options.severity;
    this.suggestions = options.suggestions;
    this.fingerprints = options.fingerprints ?? new FingerprintCache();
  }

  assemble(findings: readonly Finding[]): Issue[] {
    const merged = this.merge(findings.filter((finding) => !this.severity.shouldSuppress(finding.kind, finding.metrics)));

    const coveredByKind = new Map<string, ReadonlySet<string>>();
    for (const dominant of new Set(Object.values(SUPERSEDED_BY))) {
      coveredByKind.set(dominant, fingerprintsOfKind(merged, dominant));
    }

    const issues = merged
      .filter((finding) => !isSuperseded(finding, coveredByKind))
      .map((finding) => this.toIssue(finding));

    // Array#sort is stable, so ties keep first-seen order.
    issues.sort((a, b) => SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity]);
    return issues.map((issue) => deepFreeze(issue));
  }

  private merge(findings: readonly Finding[]): MergedFinding[] {
    const byKey = new Map<string, MergedFinding>();
    for (const finding of findings) {
      const operations = dedupOperations(finding.relatedOperations, this.fingerprints);
      const key = mergeKey(finding, operations);
      const existing = byKey.get(key);
      if (!existing) {
        byKey.set(key, {
          kind: finding.kind,
          title: finding.title,
          narrative: finding.narrative,
          metrics: { ...finding.metrics },
          operations,
          ...(finding.relatedOrigin ? { origin: finding.relatedOrigin } : {}),
          ...(finding.suggestionParameters ? { suggestionParameters: finding.suggestionParameters } : {}),
        });
        continue;
      }
      existing.metrics = mergeMetrics(existing.metrics, finding.metrics);
      operations.forEach((operation, index) => {
        const target = existing.operations[index];
        if (target) target.occurrences += operation.occurrences;
      });
    }
    return Array.from(byKey.values());
  }

  private toIssue(finding: MergedFinding): Issue {
    const suggestion = this.suggest(finding);
    const [first] = finding.operations;
    const origin = finding.origin ?? (first ? primaryFrame(first.trace) : undefined);
    return {
      kind: finding.kind,
      title: finding.title,
      narrative: finding.narrative,
      severity: this.severity.calculate(finding.kind, finding.metrics),
      metrics: finding.metrics,
      operations: finding.operations,
      ...(suggestion ? { suggestion } : {}),
      ...(origin ? { origin } : {}),
    };
  }

  private suggest(finding: MergedFinding): Suggestion | undefined {
    if (!this.suggestions) return undefined;
    const parameters = refreshParameters(finding.suggestionParameters ?? {}, finding.metrics);
    try {
      const suggestion = this.suggestions.suggest(finding.kind, parameters);
      return suggestion ? { code: suggestion.code, description: suggestion.description } : undefined;
    } catch (error) {
      logWarning('[assembly] suggestion provider failed', {
        kind: finding.kind,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
