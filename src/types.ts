/**
 * @fileoverview Shared domain types
 *
 * Operation traces flow in, findings flow between analyzers and the
 * assembler, issues flow out to the host.
 */

// ============================================================================
// OPERATION TRACES
// ============================================================================

/** One stack frame of the code that issued an operation. */
export interface OriginFrame {
  readonly file: string;
  readonly line: number;
  /** 1-based, when the producer knows it. */
  readonly column?: number;
}

/** Bound values keyed by position (0-based) or by name, in binding order. */
export type OperationParameters = ReadonlyMap<string | number, unknown>;

/** One executed database operation. Immutable once constructed. */
export interface OperationTrace {
  readonly text: string;
  readonly parameters: OperationParameters;
  readonly durationMs: number;
  readonly rowCount?: number;
  /** Most recent frame first; present only when the host captured origins. */
  readonly origin?: readonly OriginFrame[];
}

// ============================================================================
// SEVERITY
// ============================================================================

export type Severity = 'critical' | 'warning' | 'info';

export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 0,
  warning: 1,
  info: 2,
};

// ============================================================================
// FINDINGS
// ============================================================================

export type FindingMetrics = Readonly<Record<string, number>>;

export type SuggestionParameters = Readonly<Record<string, string | number>>;

/** Raw analyzer output, before suppression, merging and severity. */
export interface Finding {
  readonly kind: string;
  readonly title: string;
  readonly narrative: string;
  readonly metrics: FindingMetrics;
  readonly relatedOperations: readonly OperationTrace[];
  readonly relatedOrigin?: OriginFrame;
  /** Values the suggestion provider may interpolate. */
  readonly suggestionParameters?: SuggestionParameters;
}

// ============================================================================
// ISSUES
// ============================================================================

export interface Suggestion {
  readonly code: string;
  readonly description: string;
}

/** A representative operation standing for every operation sharing its fingerprint. */
export interface IssueOperation {
  readonly trace: OperationTrace;
  readonly fingerprint: string;
  readonly occurrences: number;
}

export interface Issue {
  readonly kind: string;
  readonly title: string;
  readonly narrative: string;
  readonly severity: Severity;
  readonly metrics: FindingMetrics;
  readonly operations: readonly IssueOperation[];
  readonly suggestion?: Suggestion;
  readonly origin?: OriginFrame;
}
