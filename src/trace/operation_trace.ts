/**
 * @fileoverview Operation trace construction
 *
 * `createOperationTrace` is the only way a trace enters the engine. It
 * validates, copies and freezes; it never coerces.
 */

import { Errors } from '../core/errors.js';
import type { OperationParameters, OperationTrace, OriginFrame } from '../types.js';

export interface OperationTraceInput {
  text: string;
  parameters?: OperationParameters | readonly unknown[] | Readonly<Record<string, unknown>>;
  durationMs: number;
  rowCount?: number;
  origin?: readonly OriginFrame[];
}

function describe(value: unknown): string {
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return JSON.stringify(value);
  return value === null ? 'null' : typeof value;
}

function toParameters(
  parameters: OperationTraceInput['parameters'],
): ReadonlyMap<string | number, unknown> {
  if (parameters === undefined) {
    return new Map();
  }
  if (parameters instanceof Map) {
    return new Map(parameters);
  }
  if (Array.isArray(parameters)) {
    return new Map(parameters.map((value, index) => [index, value]));
  }
  return new Map(Object.entries(parameters));
}

function validateFrame(frame: OriginFrame, index: number): OriginFrame {
  if (typeof frame.file !== 'string' || frame.file.length === 0) {
    throw Errors.validation(`origin[${index}].file`, 'non-empty string', describe(frame.file));
  }
  if (!Number.isInteger(frame.line) || frame.line < 0) {
    throw Errors.validation(`origin[${index}].line`, 'non-negative integer', describe(frame.line));
  }
  return Object.freeze({ file: frame.file, line: frame.line });
}

/**
 * @throws ValidationError on empty text, a negative or non-finite duration,
 * a non-integer row count or a malformed origin frame
 */
export function createOperationTrace(input: OperationTraceInput): OperationTrace {
  if (typeof input.text !== 'string' || input.text.trim().length === 0) {
    throw Errors.validation('text', 'non-empty string', describe(input.text));
  }
  if (typeof input.durationMs !== 'number' || !Number.isFinite(input.durationMs) || input.durationMs < 0) {
    throw Errors.validation('durationMs', 'finite number >= 0', describe(input.durationMs));
  }
  if (input.rowCount !== undefined && (!Number.isInteger(input.rowCount) || input.rowCount < 0)) {
    throw Errors.validation('rowCount', 'non-negative integer', describe(input.rowCount));
  }

  const origin = input.origin?.map(validateFrame);
  const trace: OperationTrace = {
    text: input.text,
    parameters: toParameters(input.parameters),
    durationMs: input.durationMs,
    ...(input.rowCount !== undefined ? { rowCount: input.rowCount } : {}),
    ...(origin !== undefined ? { origin: Object.freeze(origin) } : {}),
  };
  return Object.freeze(trace);
}

/** Most recent origin frame, if the host captured origins. */
export function primaryFrame(trace: OperationTrace): OriginFrame | undefined {
  return trace.origin?.[0];
}
