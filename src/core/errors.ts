/**
 * @fileoverview query-lens error hierarchy
 *
 * Typed, structured errors for every failure the engine distinguishes:
 * malformed trace input, invalid configuration, unreachable diagnostic
 * capabilities, isolated analyzer failures and abandoned passes.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class QueryLensError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  /** Structured fields a subclass adds under `details`. */
  protected detail(): Record<string, unknown> | undefined {
    return undefined;
  }

  toJSON(): ErrorJSON {
    const details = this.detail();
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
      ...(details ? { details } : {}),
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends QueryLensError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  protected detail(): Record<string, unknown> {
    return { field: this.field, expected: this.expected, received: this.received };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends QueryLensError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  protected detail(): Record<string, unknown> {
    return { configKey: this.configKey };
  }
}

// ============================================================================
// CAPABILITY ERRORS
// ============================================================================

export type CapabilityName = 'explainPlan' | 'fetchPlatformSetting' | 'describeTable';

export class CapabilityUnavailableError extends QueryLensError {
  readonly code = 'CAPABILITY_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly capability: CapabilityName,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Capability ${capability} unavailable: ${message}`);
    this.name = 'CapabilityUnavailableError';
  }

  protected detail(): Record<string, unknown> {
    return { capability: this.capability, cause: this.cause?.message };
  }
}

// ============================================================================
// ANALYZER ERRORS
// ============================================================================

export type AnalyzerFailureReason = 'error' | 'timeout';

/**
 * An analyzer threw, or one of its capability calls failed or timed out.
 * Never escapes the pipeline; it is recorded as a diagnostic note.
 */
export class AnalyzerFailure extends QueryLensError {
  readonly code = 'ANALYZER_FAILURE';
  readonly retryable = false;

  constructor(
    readonly analyzerKind: string,
    readonly reason: AnalyzerFailureReason,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Analyzer ${analyzerKind} failed (${reason}): ${message}`);
    this.name = 'AnalyzerFailure';
  }

  protected detail(): Record<string, unknown> {
    return { analyzerKind: this.analyzerKind, reason: this.reason, cause: this.cause?.message };
  }
}

// ============================================================================
// TIMEOUT ERRORS
// ============================================================================

export class TimeoutError extends QueryLensError {
  readonly code = 'TIMEOUT';
  readonly retryable = true;

  constructor(
    readonly timeoutMs: number,
    readonly context?: string,
  ) {
    super(context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }

  protected detail(): Record<string, unknown> {
    return { timeoutMs: this.timeoutMs, context: this.context };
  }
}

// ============================================================================
// PARSE ERRORS
// ============================================================================

export class ParseError extends QueryLensError {
  readonly code = 'PARSE_ERROR';
  readonly retryable = false;

  constructor(
    readonly format: string,
    message: string,
    readonly line?: number,
    readonly column?: number,
  ) {
    super(`Failed to parse ${format}: ${message}`);
    this.name = 'ParseError';
  }

  protected detail(): Record<string, unknown> {
    return { format: this.format, line: this.line, column: this.column };
  }
}

// ============================================================================
// ABORT ERRORS
// ============================================================================

export class AnalysisAbortedError extends QueryLensError {
  readonly code = 'ANALYSIS_ABORTED';
  readonly retryable = true;

  constructor(message = 'Analysis pass abandoned by the host') {
    super(message);
    this.name = 'AnalysisAbortedError';
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isQueryLensError(error: unknown): error is QueryLensError {
  return error instanceof QueryLensError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isCapabilityUnavailableError(error: unknown): error is CapabilityUnavailableError {
  return error instanceof CapabilityUnavailableError;
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  validation: (field: string, expected: string, received: string) =>
    new ValidationError(field, expected, received),

  config: (key: string, message: string) =>
    new ConfigurationError(key, message),

  capability: (capability: CapabilityName, message: string, cause?: Error) =>
    new CapabilityUnavailableError(capability, message, cause),

  analyzer: (kind: string, reason: AnalyzerFailureReason, message: string, cause?: Error) =>
    new AnalyzerFailure(kind, reason, message, cause),

  timeout: (timeoutMs: number, context?: string) =>
    new TimeoutError(timeoutMs, context),

  parse: (format: string, message: string, line?: number, column?: number) =>
    new ParseError(format, message, line, column),

  aborted: (message?: string) =>
    new AnalysisAbortedError(message),
};
