/**
 * Result type for operations that can fail in expected ways.
 *
 * Callers branch on `success` instead of wrapping calls in try/catch, which keeps
 * routine failures (validation, missing records) out of the exception path.
 */
export type Result<T, E = string> = { success: true; data: T } | { success: false; error: E };

export function Ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function Err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
