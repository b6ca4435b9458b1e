/**
 * Result type for expected failures.
 *
 * Repositories return `err(...)` for outcomes a caller must handle
 * (a record that does not exist) and throw only for faults.
 */

export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

export interface Err<E> {
  readonly ok: false;
  readonly value?: never;
  readonly error: E;
}

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Returns the value of an Ok result, or null for an Err.
 */
export function okOrNull<T, E>(result: Result<T, E>): T | null {
  return result.ok ? result.value : null;
}
