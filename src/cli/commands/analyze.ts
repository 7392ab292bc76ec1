/**
 * @fileoverview Analyze Command
 *
 * Runs one analysis pass over a JSON trace dump and, optionally, source
 * files. The CLI has no database connection, so analyzers that need one
 * are skipped by the pipeline.
 *
 * Usage:
 *   query-lens analyze <traces.json> [--source <file>...] [--config <file>] [--json] [--fail-on <severity>]
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { loadConfigFile } from '../../config/analysis_config.js';
import { Errors } from '../../core/errors.js';
import { partitionResults, safeAsync } from '../../core/result.js';
import { AnalysisEngine, type CompletedAnalysis } from '../../engine/analysis_engine.js';
import { parseSourceUnit, type SourceUnit } from '../../source/parse.js';
import { logDebug } from '../../telemetry/logger.js';
import { extractTraceRecords } from '../../trace/ingest.js';
import type { Severity } from '../../types.js';
import { createError } from '../errors.js';
import { formatTextReport, hasIssuesAtOrAbove, toJsonReport } from '../format.js';

// ============================================================================
// Types
// ============================================================================

export interface AnalyzeCommandOptions {
  args: string[];
  /** Cancels the pass; the entry point wires it to SIGINT. */
  signal?: AbortSignal;
}

export interface AnalyzeRequest {
  tracesPath: string;
  sourcePaths: readonly string[];
  configPath?: string;
  signal?: AbortSignal;
}

const SEVERITIES: readonly Severity[] = ['critical', 'warning', 'info'];

function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

// ============================================================================
// Input loading
// ============================================================================

async function readInput(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw createError('INPUT_UNREADABLE', `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {
      path: filePath,
    });
  }
}

async function readTraceRecords(filePath: string): Promise<readonly unknown[]> {
  const content = await readInput(filePath);
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw Errors.parse(filePath, error instanceof Error ? error.message : String(error));
  }
  return extractTraceRecords(document);
}

/**
 * Parse every source file, reporting the first failure after all have been
 * attempted.
 */
async function readSourceUnits(paths: readonly string[]): Promise<SourceUnit[]> {
  const results = await Promise.all(
    paths.map((filePath) => safeAsync(async () => parseSourceUnit(filePath, await readInput(filePath)))),
  );
  const { values, errors } = partitionResults(results);
  const [first] = errors;
  if (first) {
    logDebug('[cli] source files rejected', { failed: errors.length, total: paths.length });
    throw first;
  }
  return values;
}

// ============================================================================
// Command
// ============================================================================

/**
 * Run one pass for the CLI.
 *
 * @throws CliError when the pass is not performed
 */
export async function runAnalyze(request: AnalyzeRequest): Promise<CompletedAnalysis> {
  const config = request.configPath ? await loadConfigFile(request.configPath) : {};
  const engine = new AnalysisEngine({ config });

  const records = await readTraceRecords(request.tracesPath);
  const sources = await readSourceUnits(request.sourcePaths);
  const outcome = await engine.analyzeRecords(records, {
    sources,
    ...(request.signal ? { signal: request.signal } : {}),
  });

  if (outcome.status === 'not_performed') {
    throw createError('ANALYSIS_NOT_PERFORMED', outcome.message, { reason: outcome.reason });
  }
  return outcome;
}

/**
 * Parse arguments, run the pass and print the report.
 *
 * @returns the process exit code: 1 when `--fail-on` matched an issue, else 0
 */
export async function analyzeCommand(options: AnalyzeCommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      source: { type: 'string', short: 's', multiple: true },
      config: { type: 'string', short: 'c' },
      json: { type: 'boolean', default: false },
      'fail-on': { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });

  const [tracesPath, ...extra] = positionals;
  if (!tracesPath) {
    throw createError('INVALID_ARGUMENT', 'Missing trace file. Usage: query-lens analyze <traces.json>');
  }
  if (extra.length > 0) {
    throw createError('INVALID_ARGUMENT', `Unexpected arguments: ${extra.join(' ')}`);
  }
  const failOn = values['fail-on'];
  if (failOn !== undefined && !isSeverity(failOn)) {
    throw createError('INVALID_ARGUMENT', `--fail-on must be one of ${SEVERITIES.join(', ')}, got ${failOn}`);
  }

  const outcome = await runAnalyze({
    tracesPath,
    sourcePaths: values.source ?? [],
    ...(values.config ? { configPath: values.config } : {}),
    ...(options.signal ? { signal: options.signal } : {}),
  });

  console.log(values.json ? JSON.stringify(toJsonReport(outcome), null, 2) : formatTextReport(outcome));
  return failOn !== undefined && hasIssuesAtOrAbove(outcome.issues, failOn) ? 1 : 0;
}
