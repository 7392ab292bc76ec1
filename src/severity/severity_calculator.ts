/**
 * @fileoverview Severity calculation and suppression
 *
 * One pure policy per issue kind. `shouldSuppress` runs first: a
 * suppressed finding never becomes an issue. Tiers are checked Critical,
 * then Warning, else Info, and conditions inside a tier are ORed. Lower
 * bounds are inclusive; the strict (`>`) boundaries are slow_query,
 * find_all and order_by_without_limit at Critical.
 *
 * A missing metric reads as 0. Every policy is monotone: raising any
 * metric never lowers the tier.
 */

import type { FindingMetrics, Severity } from '../types.js';
import { boundary, defaultThresholdsFor, floor, type BuiltInKind, type Thresholds } from './thresholds.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SeverityPolicy {
  shouldSuppress(metrics: FindingMetrics, thresholds: Thresholds): boolean;
  calculate(metrics: FindingMetrics, thresholds: Thresholds): Severity;
}

function metric(metrics: FindingMetrics, name: string): number {
  return metrics[name] ?? 0;
}

// ============================================================================
// POLICIES
// ============================================================================

const nPlusOne: SeverityPolicy = {
  shouldSuppress: (m, t) => metric(m, 'count') < floor(t, 'suppressCount'),
  calculate: (m, t) => {
    const count = metric(m, 'count');
    const total = metric(m, 'totalDurationMs');
    if (
      count >= boundary(t, 'criticalCount') ||
      (count >= boundary(t, 'criticalPairedCount') && total >= boundary(t, 'criticalPairedTotalDurationMs'))
    ) {
      return 'critical';
    }
    if (count >= boundary(t, 'warningCount') || total >= boundary(t, 'warningTotalDurationMs')) {
      return 'warning';
    }
    return 'info';
  },
};

const slowQuery: SeverityPolicy = {
  shouldSuppress: (m, t) => metric(m, 'durationMs') < floor(t, 'suppressDurationMs'),
  calculate: (m, t) => {
    const duration = metric(m, 'durationMs');
    if (duration > boundary(t, 'criticalDurationMs')) return 'critical';
    if (duration >= boundary(t, 'warningDurationMs')) return 'warning';
    return 'info';
  },
};

/** Row-volume policy shared by find_all and order_by_without_limit. */
const rowVolume: SeverityPolicy = {
  shouldSuppress: (m, t) => metric(m, 'rows') < floor(t, 'suppressRows'),
  calculate: (m, t) => {
    const rows = metric(m, 'rows');
    if (rows > boundary(t, 'criticalRows')) return 'critical';
    if (rows >= boundary(t, 'warningRows') || metric(m, 'durationMs') >= boundary(t, 'warningDurationMs')) {
      return 'warning';
    }
    return 'info';
  },
};

const missingIndex: SeverityPolicy = {
  shouldSuppress: (m, t) => metric(m, 'rowsScanned') < floor(t, 'suppressRowsScanned'),
  calculate: (m, t) => {
    const scanned = metric(m, 'rowsScanned');
    const duration = metric(m, 'durationMs');
    if (scanned >= boundary(t, 'criticalRowsScanned') || duration >= boundary(t, 'criticalDurationMs')) {
      return 'critical';
    }
    if (scanned >= boundary(t, 'warningRowsScanned') || duration >= boundary(t, 'warningDurationMs')) {
      return 'warning';
    }
    return 'info';
  },
};

const frequentQuery: SeverityPolicy = {
  shouldSuppress: (m, t) => metric(m, 'count') < floor(t, 'suppressCount'),
  calculate: (m, t) => {
    const count = metric(m, 'count');
    const total = metric(m, 'totalDurationMs');
    if (count >= boundary(t, 'criticalCount') || total >= boundary(t, 'criticalTotalDurationMs')) {
      return 'critical';
    }
    if (count >= boundary(t, 'warningCount') || total >= boundary(t, 'warningTotalDurationMs')) {
      return 'warning';
    }
    return 'info';
  },
};

const ineffectiveLike: SeverityPolicy = {
  shouldSuppress: () => false,
  calculate: (m, t) => (metric(m, 'durationMs') >= boundary(t, 'criticalDurationMs') ? 'critical' : 'warning'),
};

const alwaysWarning: SeverityPolicy = {
  shouldSuppress: () => false,
  calculate: () => 'warning',
};

const alwaysCritical: SeverityPolicy = {
  shouldSuppress: () => false,
  calculate: () => 'critical',
};

const sensitiveExposure: SeverityPolicy = {
  shouldSuppress: (m) => metric(m, 'exposedFields') === 0 && metric(m, 'wholeObject') === 0,
  calculate: () => 'critical',
};

const rawInterpolation: SeverityPolicy = {
  shouldSuppress: (m) => metric(m, 'interpolations') === 0,
  calculate: () => 'critical',
};

const nullComparison: SeverityPolicy = {
  shouldSuppress: (m) => metric(m, 'comparisons') === 0,
  calculate: () => 'critical',
};

const divisionByZero: SeverityPolicy = {
  shouldSuppress: (m) => metric(m, 'divisions') === 0,
  calculate: () => 'warning',
};

const eagerLoading: SeverityPolicy = {
  shouldSuppress: (m, t) => metric(m, 'joins') < floor(t, 'suppressJoins'),
  calculate: (m, t) => (metric(m, 'joins') >= boundary(t, 'criticalJoins') ? 'critical' : 'warning'),
};

const injectionRisk: SeverityPolicy = {
  shouldSuppress: (m, t) => metric(m, 'risk') < floor(t, 'minRisk'),
  calculate: (m, t) => (metric(m, 'risk') >= boundary(t, 'criticalRisk') ? 'critical' : 'warning'),
};

const charset: SeverityPolicy = {
  shouldSuppress: () => false,
  calculate: (m) => (metric(m, 'unsafeEncoding') >= 1 ? 'critical' : 'warning'),
};

export const SEVERITY_POLICIES: Readonly<Record<BuiltInKind, SeverityPolicy>> = {
  n_plus_one: nPlusOne,
  slow_query: slowQuery,
  find_all: rowVolume,
  order_by_without_limit: rowVolume,
  missing_index: missingIndex,
  frequent_query: frequentQuery,
  ineffective_like: ineffectiveLike,
  timezone_mismatch: alwaysWarning,
  strict_mode_disabled: alwaysCritical,
  sensitive_data_exposure: sensitiveExposure,
  raw_query_interpolation: rawInterpolation,
  null_comparison: nullComparison,
  division_by_zero: divisionByZero,
  eager_loading: eagerLoading,
  limit_with_collection_join: alwaysCritical,
  sql_injection: injectionRisk,
  charset_misconfigured: charset,
};

/** Applied to kinds nobody registered a policy for. */
export const DEFAULT_POLICY: SeverityPolicy = alwaysWarning;

// ============================================================================
// CALCULATOR
// ============================================================================

interface BoundPolicy {
  readonly policy: SeverityPolicy;
  readonly thresholds: Thresholds;
}

/**
 * Severity policies bound to the thresholds resolved for one engine.
 */
export class SeverityCalculator {
  private readonly bound = new Map<string, BoundPolicy>();

  constructor(thresholdsByKind: ReadonlyMap<string, Thresholds> = new Map()) {
    for (const [kind, policy] of Object.entries(SEVERITY_POLICIES)) {
      this.bound.set(kind, { policy, thresholds: thresholdsByKind.get(kind) ?? defaultThresholdsFor(kind) });
    }
    for (const [kind, thresholds] of thresholdsByKind) {
      if (!this.bound.has(kind)) this.bound.set(kind, { policy: DEFAULT_POLICY, thresholds });
    }
  }

  /** Install the policy for a kind contributed by a custom analyzer. */
  register(kind: string, policy: SeverityPolicy, thresholds: Thresholds = {}): void {
    this.bound.set(kind, { policy, thresholds });
  }

  shouldSuppress(kind: string, metrics: FindingMetrics): boolean {
    const entry = this.bound.get(kind);
    return entry ? entry.policy.shouldSuppress(metrics, entry.thresholds) : false;
  }

  calculate(kind: string, metrics: FindingMetrics): Severity {
    const entry = this.bound.get(kind);
    return entry ? entry.policy.calculate(metrics, entry.thresholds) : DEFAULT_POLICY.calculate(metrics, {});
  }
}
