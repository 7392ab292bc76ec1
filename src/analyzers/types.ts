/**
 * @fileoverview Analyzer contract
 *
 * Trace analyzers read the ingested trace set of one pass; source
 * analyzers read the parsed code units of the same pass. Both return raw
 * findings, synchronously or not. An analyzer may contribute its own
 * severity policy and default thresholds for a kind the engine does not
 * know.
 */

import type { MetadataCache } from '../cache/metadata_cache.js';
import type { DiagnosticGateway } from '../capabilities/gateway.js';
import type { CapabilityName } from '../core/errors.js';
import type { SeverityPolicy } from '../severity/severity_calculator.js';
import type { Thresholds } from '../severity/thresholds.js';
import type { SourceUnit } from '../source/parse.js';
import type { FingerprintCache } from '../sql/fingerprint.js';
import type { SqlStructureReader } from '../sql/structure.js';
import type { Finding, OperationTrace } from '../types.js';

export type AnalyzerTarget = 'traces' | 'source';

/** Engine-wide settings that are not per-kind thresholds. */
export interface AnalysisSettings {
  /** IANA zone or offset the application writes timestamps in. */
  readonly applicationTimeZone?: string;
  /** Lower-case snake_case fragments marking a field as sensitive. */
  readonly sensitivePatterns: readonly string[];
}

interface AnalysisContextBase {
  readonly thresholds: Thresholds;
  readonly settings: AnalysisSettings;
  readonly signal: AbortSignal;
}

export interface TraceAnalysisContext extends AnalysisContextBase {
  readonly traces: readonly OperationTrace[];
  readonly gateway: DiagnosticGateway;
  readonly cache: MetadataCache;
  readonly fingerprints: FingerprintCache;
  readonly structure: SqlStructureReader;
}

export interface SourceAnalysisContext extends AnalysisContextBase {
  readonly units: readonly SourceUnit[];
}

interface AnalyzerBase {
  readonly kind: string;
  readonly severity?: SeverityPolicy;
  readonly defaultThresholds?: Thresholds;
}

export interface TraceAnalyzer extends AnalyzerBase {
  readonly target: 'traces';
  /** Capabilities without which the analyzer is skipped for the pass. */
  readonly requires?: readonly CapabilityName[];
  analyze(context: TraceAnalysisContext): Finding[] | Promise<Finding[]>;
}

export interface SourceAnalyzer extends AnalyzerBase {
  readonly target: 'source';
  analyze(context: SourceAnalysisContext): Finding[] | Promise<Finding[]>;
}

export type Analyzer = TraceAnalyzer | SourceAnalyzer;
