/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { getString } from '../core/property_access.js';
import {
  isConfigurationError,
  isQueryLensError,
  isValidationError,
  ParseError,
} from '../core/errors.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'INPUT_UNREADABLE'
  | 'INVALID_INPUT'
  | 'INVALID_CONFIG'
  | 'ANALYSIS_NOT_PERFORMED'
  | 'INTERNAL';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `query-lens help analyze` for usage information.',
  INPUT_UNREADABLE: 'Check that the file exists and is readable.',
  INVALID_INPUT: 'The trace dump must be a JSON array of records or an object with a `traces` array.',
  INVALID_CONFIG: 'Fix the configuration key named above; unknown keys and thresholds are rejected.',
  ANALYSIS_NOT_PERFORMED: 'Run the analysis again; no partial results were produced.',
  INTERNAL: 'Re-run with QUERY_LENS_LOG_LEVEL=debug for details.',
};

/** Exit 1 is reserved for `--fail-on` matching an issue. */
export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  INPUT_UNREADABLE: 3,
  INVALID_INPUT: 4,
  INVALID_CONFIG: 5,
  ANALYSIS_NOT_PERFORMED: 6,
  INTERNAL: 70,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/** Map any thrown value onto a CLI error. */
export function classifyError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (isConfigurationError(error)) {
    return createError('INVALID_CONFIG', error.message, { configKey: error.configKey });
  }
  if (error instanceof ParseError || isValidationError(error)) {
    return createError('INVALID_INPUT', error.message, error.toJSON().details);
  }
  if (isQueryLensError(error)) {
    return createError('INTERNAL', error.message, { code: error.code });
  }
  // node:util parseArgs rejects unknown options with ERR_PARSE_ARGS_* codes
  if (getString(error, 'code')?.startsWith('ERR_PARSE_ARGS')) {
    return createError('INVALID_ARGUMENT', error instanceof Error ? error.message : String(error));
  }
  return createError('INTERNAL', error instanceof Error ? error.message : String(error));
}

export function getExitCode(error: CliError): number {
  return EXIT_CODES[error.code];
}

export function formatError(error: CliError, json: boolean): string {
  if (json) {
    return JSON.stringify(
      {
        error: {
          code: error.code,
          message: error.message,
          suggestion: error.suggestion ?? null,
          ...(error.details ? { details: error.details } : {}),
        },
      },
      null,
      2,
    );
  }
  const lines = [`Error [${error.code}]: ${error.message}`];
  if (error.suggestion) {
    lines.push('', `Suggestion: ${error.suggestion}`);
  }
  return lines.join('\n');
}
