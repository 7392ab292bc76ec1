import { Errors } from '../core/errors.js';
import type { Analyzer, SourceAnalyzer, TraceAnalyzer } from './types.js';

/**
 * Ordered analyzer set. Registration order is run order; the pipeline
 * iterates whatever is registered and never names an analyzer itself.
 */
export class AnalyzerRegistry {
  private analyzers = new Map<string, Analyzer>();

  register(analyzer: Analyzer): void {
    if (this.analyzers.has(analyzer.kind)) {
      throw Errors.config(`analyzers.${analyzer.kind}`, 'an analyzer with this kind is already registered');
    }
    this.analyzers.set(analyzer.kind, analyzer);
  }

  registerAll(analyzers: readonly Analyzer[]): void {
    for (const analyzer of analyzers) {
      this.register(analyzer);
    }
  }

  unregister(kind: string): void {
    this.analyzers.delete(kind);
  }

  get(kind: string): Analyzer | undefined {
    return this.analyzers.get(kind);
  }

  has(kind: string): boolean {
    return this.analyzers.has(kind);
  }

  getAll(): Analyzer[] {
    return Array.from(this.analyzers.values());
  }

  traceAnalyzers(): TraceAnalyzer[] {
    return this.getAll().filter((analyzer): analyzer is TraceAnalyzer => analyzer.target === 'traces');
  }

  sourceAnalyzers(): SourceAnalyzer[] {
    return this.getAll().filter((analyzer): analyzer is SourceAnalyzer => analyzer.target === 'source');
  }
}
