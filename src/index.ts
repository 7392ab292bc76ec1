/**
 * @fileoverview query-lens - database access analysis for one unit of work
 *
 * Takes the operations a unit of work executed (and, for some checks, the
 * source that issued them) and returns a ranked list of issues, each with
 * its severity, the operations that evidence it and an optional fix.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { AnalysisEngine } from 'query-lens';
 *
 * const engine = new AnalysisEngine({
 *   config: { analyzers: { n_plus_one: { thresholds: { minOccurrences: 3 } } } },
 *   capabilities: { explainPlan: (text, parameters, signal) => db.explain(text, parameters, signal) },
 * });
 *
 * const outcome = await engine.analyzeRecords(collectedTraces);
 * if (outcome.status === 'completed') {
 *   for (const issue of outcome.issues) {
 *     console.log(issue.severity, issue.title);
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

export const QUERY_LENS_VERSION = '0.1.0';

// Engine
export { AnalysisEngine } from './engine/analysis_engine.js';
export type {
  AnalysisEngineOptions,
  AnalysisInput,
  AnalysisNotPerformed,
  AnalysisOutcome,
  CompletedAnalysis,
} from './engine/analysis_engine.js';
export { AnalyzerPipeline } from './engine/pipeline.js';
export type { PassServices, PipelineResult } from './engine/pipeline.js';

// Data model
export { SEVERITY_RANK } from './types.js';
export type {
  Finding,
  FindingMetrics,
  Issue,
  IssueOperation,
  OperationParameters,
  OperationTrace,
  OriginFrame,
  Severity,
  Suggestion,
  SuggestionParameters,
} from './types.js';

// Traces
export { createOperationTrace } from './trace/operation_trace.js';
export type { OperationTraceInput } from './trace/operation_trace.js';
export { extractTraceRecords, ingestTraces, normalizeRecord } from './trace/ingest.js';
export type { IngestionResult, RejectedRecord } from './trace/ingest.js';

// SQL
export { fingerprint, FingerprintCache } from './sql/fingerprint.js';
export { SqlStructureReader } from './sql/structure.js';
export type { SqlDialect, SqlStructure, StatementType } from './sql/structure.js';
export { tokenizeSql } from './sql/tokenizer.js';
export type { SqlToken, SqlTokenType } from './sql/tokenizer.js';

// Source
export { frameOf, parseSourceUnit } from './source/parse.js';
export type { SourceUnit } from './source/parse.js';
export { SourceVisitor } from './source/visitor.js';
export { SensitiveFieldVisitor } from './source/sensitive_field_visitor.js';
export { SerializationVisitor } from './source/serialization_visitor.js';
export { RawQueryVisitor, type RawQueryCall } from './source/raw_query_visitor.js';

// Analyzers
export {
  AnalyzerRegistry,
  createDefaultAnalyzerRegistry,
  DEFAULT_ANALYZERS,
} from './analyzers/index.js';
export type {
  Analyzer,
  AnalysisSettings,
  SourceAnalysisContext,
  SourceAnalyzer,
  TraceAnalysisContext,
  TraceAnalyzer,
} from './analyzers/index.js';

// Severity
export { DEFAULT_POLICY, SEVERITY_POLICIES, SeverityCalculator } from './severity/severity_calculator.js';
export type { SeverityPolicy } from './severity/severity_calculator.js';
export { DEFAULT_THRESHOLDS, defaultThresholdsFor } from './severity/thresholds.js';
export type { BuiltInKind, Thresholds } from './severity/thresholds.js';

// Assembly and export
export { IssueAssembler } from './assembly/assembler.js';
export type { AssemblerOptions } from './assembly/assembler.js';
export { exportIssues, summarizeIssues, toPlainIssue } from './assembly/export.js';
export type { IssueSummary, JsonValue, PlainIssue, PlainOperation } from './assembly/export.js';

// Capabilities, cache and suggestions
export { DEFAULT_CAPABILITY_TIMEOUT_MS, DiagnosticGateway } from './capabilities/gateway.js';
export type {
  DiagnosticCapabilities,
  ExecutionPlan,
  PlanStep,
  TableIndex,
  TableMetadata,
} from './capabilities/types.js';
export { MetadataCache } from './cache/metadata_cache.js';
export type { MetadataCacheStats } from './cache/metadata_cache.js';
export { DEFAULT_TEMPLATES, TemplateSuggestionProvider } from './suggestions/template_provider.js';
export type { SuggestionTemplate } from './suggestions/template_provider.js';
export type { SuggestionProvider } from './suggestions/types.js';

// Configuration
export {
  AnalysisConfigSchema,
  loadConfigFile,
  parseAnalysisConfig,
  resolveAnalysisConfig,
} from './config/analysis_config.js';
export type { AnalysisConfig, ResolvedAnalysisConfig } from './config/analysis_config.js';

// Errors
export {
  AnalysisAbortedError,
  AnalyzerFailure,
  CapabilityUnavailableError,
  ConfigurationError,
  Errors,
  isCapabilityUnavailableError,
  isConfigurationError,
  isQueryLensError,
  isTimeoutError,
  isValidationError,
  ParseError,
  QueryLensError,
  TimeoutError,
  ValidationError,
} from './core/errors.js';
export type { ErrorJSON } from './core/errors.js';
