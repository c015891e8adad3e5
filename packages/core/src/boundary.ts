// Boundary calls — every embed/store call goes through attempt() so failures
// come back as typed values. Nothing here retries; retry policy belongs to callers.

import { FilingIndexError, TransientIOError } from './errors.js';
import type { Logger } from './logger.js';

export type Result<T, E = FilingIndexError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Classify an unknown failure. FilingIndexErrors pass through untouched;
 * anything else is treated as transient I/O for the named operation.
 */
export function toFilingIndexError(operation: string, err: unknown): FilingIndexError {
  if (err instanceof FilingIndexError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransientIOError(`${operation} failed: ${message}`, operation, { cause: err });
}

export async function attempt<T>(operation: string, fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err: unknown) {
    return { ok: false, error: toFilingIndexError(operation, err) };
  }
}

export function unwrap<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw result.error;
}

/**
 * attempt() + log-and-throw. `context` is logged alongside the failure so a
 * caller can diagnose without re-running blindly.
 */
export async function callBoundary<T>(
  log: Logger,
  operation: string,
  context: Record<string, unknown>,
  fn: () => Promise<T>,
): Promise<T> {
  const result = await attempt(operation, fn);
  if (!result.ok) {
    log.error(`${operation} failed`, { ...context, error: result.error.message });
  }
  return unwrap(result);
}
