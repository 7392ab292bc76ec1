/**
 * @fileoverview Result type for explicit error handling
 *
 * Analyzer runs, record ingestion and capability calls report failure as a
 * value so that one failure never unwinds the surrounding pass.
 */

import { Errors, toError } from './errors.js';

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Wrap an async (or sync) function in a Result
 */
export async function safeAsync<T>(
  fn: () => Promise<T> | T
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(toError(e));
  }
}

export function partitionResults<T, E>(results: Result<T, E>[]): { values: T[]; errors: E[] } {
  const values: T[] = [];
  const errors: E[] = [];
  for (const result of results) {
    if (result.ok) {
      values.push(result.value);
    } else {
      errors.push(result.error);
    }
  }
  return { values, errors };
}

// ============================================================================
// ASYNC UTILITIES
// ============================================================================

export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
  /** Aborts the wrapped work when the host abandons the pass */
  signal?: AbortSignal;
}

/**
 * Run `work` with a bounded timeout. The AbortSignal handed to `work` fires on
 * timeout as well as on host cancellation, so capability implementations can
 * release their connection early.
 *
 * @throws TimeoutError when `timeoutMs` elapses first
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: WithTimeoutOptions = {}
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    throw Errors.aborted();
  }
  options.signal?.addEventListener('abort', forwardAbort, { once: true });

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = Errors.timeout(timeoutMs, options.context);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', forwardAbort);
  }
}
