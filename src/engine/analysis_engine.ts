/**
 * @fileoverview Analysis engine
 *
 * Composes ingestion, the analyzer pipeline, severity and assembly into one
 * pass with an all-or-nothing outcome: the host receives either the
 * complete ranked issue list or `not_performed`, never a partial list.
 *
 * Configuration is validated when the engine is built, so an invalid
 * threshold fails before any pass runs.
 */

import { createDefaultAnalyzerRegistry } from '../analyzers/index.js';
import type { AnalyzerRegistry } from '../analyzers/registry.js';
import { IssueAssembler } from '../assembly/assembler.js';
import { MetadataCache } from '../cache/metadata_cache.js';
import { DiagnosticGateway } from '../capabilities/gateway.js';
import type { DiagnosticCapabilities } from '../capabilities/types.js';
import {
  parseAnalysisConfig,
  resolveAnalysisConfig,
  type ResolvedAnalysisConfig,
} from '../config/analysis_config.js';
import { AnalysisAbortedError, toError, type AnalyzerFailure } from '../core/errors.js';
import { SeverityCalculator } from '../severity/severity_calculator.js';
import type { SourceUnit } from '../source/parse.js';
import { FingerprintCache } from '../sql/fingerprint.js';
import { SqlStructureReader } from '../sql/structure.js';
import { TemplateSuggestionProvider } from '../suggestions/template_provider.js';
import type { SuggestionProvider } from '../suggestions/types.js';
import { logError, logInfo } from '../telemetry/logger.js';
import { ingestTraces, type RejectedRecord } from '../trace/ingest.js';
import type { Issue, OperationTrace } from '../types.js';
import { AnalyzerPipeline } from './pipeline.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AnalysisEngineOptions {
  /** Raw configuration; validated on construction. */
  config?: unknown;
  registry?: AnalyzerRegistry;
  capabilities?: DiagnosticCapabilities;
  /** `null` disables suggestions; omitted uses the bundled templates. */
  suggestions?: SuggestionProvider | null;
  /** Host-owned cache shared by every pass of this engine. */
  cache?: MetadataCache;
}

export interface AnalysisInput {
  traces?: readonly OperationTrace[];
  sources?: readonly SourceUnit[];
  signal?: AbortSignal;
}

export interface CompletedAnalysis {
  readonly status: 'completed';
  readonly issues: readonly Issue[];
  readonly notes: readonly AnalyzerFailure[];
  readonly rejected: readonly RejectedRecord[];
}

export interface AnalysisNotPerformed {
  readonly status: 'not_performed';
  readonly reason: 'aborted' | 'error';
  readonly message: string;
  readonly notes: readonly AnalyzerFailure[];
}

export type AnalysisOutcome = CompletedAnalysis | AnalysisNotPerformed;

// ============================================================================
// ENGINE
// ============================================================================

export class AnalysisEngine {
  readonly registry: AnalyzerRegistry;
  readonly config: ResolvedAnalysisConfig;
  readonly cache: MetadataCache;
  private readonly capabilities: DiagnosticCapabilities;
  private readonly suggestions?: SuggestionProvider;
  private readonly severity: SeverityCalculator;
  private readonly pipeline: AnalyzerPipeline;

  /**
   * @throws ConfigurationError when the configuration is invalid
   */
  constructor(options: AnalysisEngineOptions = {}) {
    this.registry = options.registry ?? createDefaultAnalyzerRegistry();
    this.config = resolveAnalysisConfig(parseAnalysisConfig(options.config), this.registry);
    this.cache = options.cache ?? new MetadataCache();
    this.capabilities = options.capabilities ?? {};
    this.suggestions = options.suggestions === null ? undefined : options.suggestions ?? new TemplateSuggestionProvider();

    this.severity = new SeverityCalculator(this.config.thresholds);
    for (const analyzer of this.registry.getAll()) {
      if (analyzer.severity) {
        this.severity.register(analyzer.kind, analyzer.severity, this.config.thresholds.get(analyzer.kind));
      }
    }
    this.pipeline = new AnalyzerPipeline(this.registry, this.config);
  }

  /** Run one pass over already-constructed traces and parsed source units. */
  async analyze(input: AnalysisInput): Promise<AnalysisOutcome> {
    return this.run(input, []);
  }

  /** Ingest raw trace records, then run one pass. Dropped records are listed in `rejected`. */
  async analyzeRecords(
    records: Iterable<unknown>,
    options: Omit<AnalysisInput, 'traces'> = {},
  ): Promise<AnalysisOutcome> {
    const { traces, rejected } = ingestTraces(records);
    return this.run({ ...options, traces }, rejected);
  }

  /** Drop cached table metadata after a schema change. */
  invalidateMetadata(): void {
    this.cache.invalidate();
  }

  private async run(input: AnalysisInput, rejected: readonly RejectedRecord[]): Promise<AnalysisOutcome> {
    const signal = input.signal ?? new AbortController().signal;
    const fingerprints = new FingerprintCache(this.config.dialect);
    const traces = input.traces ?? [];
    const units = input.sources ?? [];
    let notes: readonly AnalyzerFailure[] = [];

    try {
      const result = await this.pipeline.run({
        traces,
        units,
        signal,
        fingerprints,
        cache: this.cache,
        structure: new SqlStructureReader(this.config.dialect),
        gateway: new DiagnosticGateway(this.capabilities, this.config.capabilityTimeoutMs, signal),
      });
      notes = result.notes;

      const assembler = new IssueAssembler({ severity: this.severity, suggestions: this.suggestions, fingerprints });
      const issues = assembler.assemble(result.findings);
      if (signal.aborted) {
        return this.notPerformed('aborted', 'analysis pass abandoned by the host', notes);
      }

      logInfo('[engine] analysis pass completed', {
        traces: traces.length,
        sources: units.length,
        findings: result.findings.length,
        issues: issues.length,
        failures: notes.length,
      });
      return { status: 'completed', issues, notes, rejected };
    } catch (error) {
      if (error instanceof AnalysisAbortedError) {
        return this.notPerformed('aborted', error.message, notes);
      }
      const cause = toError(error);
      logError('[engine] analysis pass failed', { error: cause.message });
      return this.notPerformed('error', cause.message, notes);
    }
  }

  private notPerformed(
    reason: AnalysisNotPerformed['reason'],
    message: string,
    notes: readonly AnalyzerFailure[],
  ): AnalysisNotPerformed {
    return { status: 'not_performed', reason, message, notes };
  }
}
