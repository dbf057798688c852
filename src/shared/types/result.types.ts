/**
 * Result Type
 *
 * Parsers, the fetcher and the resolver return a Result instead of throwing,
 * so callers decide per row or per record whether a failure is fatal.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
