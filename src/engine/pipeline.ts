/**
 * @fileoverview Analyzer pipeline
 *
 * Runs every enabled analyzer once per pass, in registration order, one at
 * a time, and concatenates their findings. A failing analyzer is skipped
 * and recorded as an AnalyzerFailure note; it never affects the others.
 * Host cancellation is the one failure that ends the pass. An analyzer
 * whose required capabilities the host did not provide is not run.
 */

import type { AnalyzerRegistry } from '../analyzers/registry.js';
import type { Analyzer, SourceAnalysisContext, TraceAnalysisContext } from '../analyzers/types.js';
import type { DiagnosticGateway } from '../capabilities/gateway.js';
import type { ResolvedAnalysisConfig } from '../config/analysis_config.js';
import {
  AnalysisAbortedError,
  Errors,
  isTimeoutError,
  type AnalyzerFailure,
  type CapabilityName,
} from '../core/errors.js';
import { safeAsync } from '../core/result.js';
import type { Thresholds } from '../severity/thresholds.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { Finding } from '../types.js';

export type PassServices = Omit<TraceAnalysisContext, 'thresholds' | 'settings'> &
  Pick<SourceAnalysisContext, 'units'>;

export interface PipelineResult {
  readonly findings: Finding[];
  readonly notes: AnalyzerFailure[];
}

/** Reject as soon as `signal` fires, whether or not `work` observes it. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(Errors.aborted());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(Errors.aborted());
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export class AnalyzerPipeline {
  constructor(
    private readonly registry: AnalyzerRegistry,
    private readonly config: ResolvedAnalysisConfig,
  ) {}

  enabledAnalyzers(): Analyzer[] {
    return this.registry.getAll().filter((analyzer) => !this.config.disabled.has(analyzer.kind));
  }

  /**
   * @throws AnalysisAbortedError when the pass's signal fires
   */
  async run(services: PassServices): Promise<PipelineResult> {
    const findings: Finding[] = [];
    const notes: AnalyzerFailure[] = [];

    for (const analyzer of this.enabledAnalyzers()) {
      if (services.signal.aborted) {
        throw Errors.aborted();
      }
      const missing = this.missingCapabilities(analyzer, services.gateway);
      if (missing.length > 0) {
        logDebug('[pipeline] analyzer skipped, capability not provided', { analyzer: analyzer.kind, missing });
        continue;
      }
      const thresholds: Thresholds = this.config.thresholds.get(analyzer.kind) ?? analyzer.defaultThresholds ?? {};
      const started = Date.now();
      const result = await safeAsync(() => raceAbort(this.invoke(analyzer, services, thresholds), services.signal));

      if (result.ok) {
        logDebug('[pipeline] analyzer completed', {
          analyzer: analyzer.kind,
          findings: result.value.length,
          durationMs: Date.now() - started,
        });
        findings.push(...result.value);
        continue;
      }
      if (result.error instanceof AnalysisAbortedError || services.signal.aborted) {
        throw Errors.aborted();
      }

      const reason = isTimeoutError(result.error) ? 'timeout' : 'error';
      const failure = Errors.analyzer(analyzer.kind, reason, result.error.message, result.error);
      logWarning('[pipeline] analyzer failed, skipping', {
        analyzer: analyzer.kind,
        reason,
        error: result.error.message,
      });
      notes.push(failure);
    }

    return { findings, notes };
  }

  private missingCapabilities(analyzer: Analyzer, gateway: DiagnosticGateway): CapabilityName[] {
    if (analyzer.target !== 'traces') return [];
    return (analyzer.requires ?? []).filter((capability) => !gateway.has(capability));
  }

  private async invoke(analyzer: Analyzer, services: PassServices, thresholds: Thresholds): Promise<Finding[]> {
    const settings = this.config.settings;
    if (analyzer.target === 'traces') {
      return analyzer.analyze({ ...services, thresholds, settings });
    }
    return analyzer.analyze({ units: services.units, signal: services.signal, thresholds, settings });
  }
}
