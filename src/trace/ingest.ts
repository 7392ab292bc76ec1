/**
 * @fileoverview Trace ingestion
 *
 * Raw records arrive in two historical shapes (`sql` / `params` /
 * `executionMS` / `row_count` / `backtrace` from the older collector, the
 * camelCase names from the current one). Ingestion normalizes the names,
 * reads sub-second timings as seconds, and hands each record to
 * `createOperationTrace`. A malformed record is dropped, logged and listed
 * in `rejected`; it never aborts the rest of the set.
 */

import { Errors, isValidationError, toError, type ValidationError } from '../core/errors.js';
import { getArray, getFirstProperty, getNumber, getString } from '../core/property_access.js';
import { logWarning } from '../telemetry/logger.js';
import type { OperationTrace, OriginFrame } from '../types.js';
import { createOperationTrace, type OperationTraceInput } from './operation_trace.js';

export interface RejectedRecord {
  readonly index: number;
  readonly record: unknown;
  readonly error: ValidationError;
}

export interface IngestionResult {
  readonly traces: readonly OperationTrace[];
  readonly rejected: readonly RejectedRecord[];
}

function readTiming(record: unknown): number {
  const raw = getFirstProperty(record, ['durationMs', 'executionMS']);
  if (typeof raw !== 'number') {
    throw Errors.validation('durationMs', 'number', raw === undefined ? 'missing' : typeof raw);
  }
  // Timings below one are seconds from the older collector.
  return raw > 0 && raw < 1 ? raw * 1000 : raw;
}

function readParameters(record: unknown): OperationTraceInput['parameters'] {
  const raw = getFirstProperty(record, ['parameters', 'params']);
  if (raw === undefined || raw === null) return undefined;
  if (raw instanceof Map || Array.isArray(raw)) return raw;
  if (typeof raw === 'object') return Object.fromEntries(Object.entries(raw));
  throw Errors.validation('parameters', 'array or object', typeof raw);
}

function readOrigin(record: unknown): OriginFrame[] | undefined {
  const raw = getFirstProperty(record, ['origin', 'backtrace']);
  if (raw === undefined || raw === null) return undefined;
  if (!Array.isArray(raw)) {
    throw Errors.validation('origin', 'array of frames', typeof raw);
  }
  const frames: OriginFrame[] = [];
  for (const frame of raw) {
    const file = getString(frame, 'file');
    // Frames from internal calls carry no file.
    if (!file) continue;
    frames.push({ file, line: getNumber(frame, 'line') ?? 0 });
  }
  return frames;
}

function readRowCount(record: unknown): number | undefined {
  const raw = getFirstProperty(record, ['rowCount', 'row_count']);
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw !== 'number') {
    throw Errors.validation('rowCount', 'non-negative integer', typeof raw);
  }
  return raw;
}

/**
 * Normalize one raw record into an operation trace.
 *
 * @throws ValidationError when the record is not usable
 */
export function normalizeRecord(record: unknown): OperationTrace {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    throw Errors.validation('record', 'object', record === null ? 'null' : typeof record);
  }
  const text = getFirstProperty(record, ['text', 'sql']);
  if (typeof text !== 'string') {
    throw Errors.validation('text', 'non-empty string', text === undefined ? 'missing' : typeof text);
  }
  const rowCount = readRowCount(record);
  const origin = readOrigin(record);
  return createOperationTrace({
    text,
    parameters: readParameters(record),
    durationMs: readTiming(record),
    ...(rowCount !== undefined ? { rowCount } : {}),
    ...(origin !== undefined ? { origin } : {}),
  });
}

export function ingestTraces(records: Iterable<unknown>): IngestionResult {
  const traces: OperationTrace[] = [];
  const rejected: RejectedRecord[] = [];
  let index = 0;
  for (const record of records) {
    try {
      traces.push(normalizeRecord(record));
    } catch (error) {
      if (!isValidationError(error)) {
        throw toError(error);
      }
      logWarning('[ingest] dropped malformed trace record', { index, field: error.field, reason: error.message });
      rejected.push({ index, record, error });
    }
    index += 1;
  }
  return { traces, rejected };
}

/** Trace records of a JSON document: either an array of records or `{ traces: [...] }`. */
export function extractTraceRecords(document: unknown): readonly unknown[] {
  if (Array.isArray(document)) {
    return document;
  }
  const records = getArray(document, 'traces') ?? getArray(document, 'queries');
  if (!records) {
    throw Errors.validation('document', 'array of trace records or { traces: [...] }', typeof document);
  }
  return records;
}
