/**
 * @fileoverview Default thresholds per issue kind
 *
 * One flat namespace per kind holds both the detection thresholds an
 * analyzer reads (`minOccurrences`, `thresholdMs`, ...) and the tier
 * boundaries its severity policy reads. Configuration overrides any of
 * these by name; names outside a kind's set are rejected.
 */

export type Thresholds = Readonly<Record<string, number>>;

export const DEFAULT_THRESHOLDS = {
  n_plus_one: {
    minOccurrences: 5,
    suppressCount: 3,
    warningCount: 3,
    warningTotalDurationMs: 10,
    criticalCount: 100,
    criticalPairedCount: 50,
    criticalPairedTotalDurationMs: 100,
  },
  slow_query: {
    thresholdMs: 100,
    suppressDurationMs: 10,
    warningDurationMs: 10,
    criticalDurationMs: 100,
  },
  find_all: {
    maxRows: 99,
    suppressRows: 50,
    warningRows: 50,
    warningDurationMs: 50,
    criticalRows: 10000,
  },
  order_by_without_limit: {
    suppressRows: 50,
    warningRows: 100,
    warningDurationMs: 50,
    criticalRows: 10000,
  },
  missing_index: {
    slowThresholdMs: 50,
    minRowsScanned: 1000,
    minTableRows: 0,
    suppressRowsScanned: 500,
    warningRowsScanned: 1000,
    warningDurationMs: 10,
    criticalRowsScanned: 100000,
    criticalDurationMs: 100,
  },
  frequent_query: {
    minExecutions: 10,
    suppressCount: 10,
    warningCount: 20,
    warningTotalDurationMs: 20,
    criticalCount: 100,
    criticalTotalDurationMs: 100,
  },
  ineffective_like: {
    criticalDurationMs: 100,
  },
  timezone_mismatch: {},
  strict_mode_disabled: {},
  sensitive_data_exposure: {},
  raw_query_interpolation: {},
  null_comparison: {},
  division_by_zero: {},
  eager_loading: {
    minJoins: 7,
    suppressJoins: 7,
    criticalJoins: 11,
  },
  limit_with_collection_join: {},
  sql_injection: {
    minRisk: 2,
    criticalRisk: 3,
  },
  charset_misconfigured: {},
} as const satisfies Record<string, Thresholds>;

export type BuiltInKind = keyof typeof DEFAULT_THRESHOLDS;

export const BUILT_IN_KINDS = Object.keys(DEFAULT_THRESHOLDS).filter(isBuiltInKind);

export function isBuiltInKind(kind: string): kind is BuiltInKind {
  return Object.prototype.hasOwnProperty.call(DEFAULT_THRESHOLDS, kind);
}

/** Tier boundary; an undefined boundary is never reached. */
export function boundary(thresholds: Thresholds, name: string): number {
  return thresholds[name] ?? Number.POSITIVE_INFINITY;
}

/** Suppression floor; an undefined floor suppresses nothing. */
export function floor(thresholds: Thresholds, name: string): number {
  return thresholds[name] ?? 0;
}

export function defaultThresholdsFor(kind: string): Thresholds {
  return isBuiltInKind(kind) ? DEFAULT_THRESHOLDS[kind] : {};
}

/** A resolved threshold of a built-in kind, falling back to its documented default. */
export function thresholdValue<K extends BuiltInKind>(
  thresholds: Thresholds,
  kind: K,
  name: keyof (typeof DEFAULT_THRESHOLDS)[K] & string,
): number {
  const defaults: Thresholds = DEFAULT_THRESHOLDS[kind];
  return thresholds[name] ?? defaults[name] ?? 0;
}
