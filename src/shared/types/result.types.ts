/**
 * =============================================================================
 * RESULT TYPES
 * =============================================================================
 *
 * Tagged success/failure value returned by every pipeline stage.
 * Stages never throw for expected failures; the caller branches on `ok`.
 * =============================================================================
 */

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Fail<E> {
  ok: false;
  error: E;
}

export type Result<T, E> = Ok<T> | Fail<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function fail<E>(error: E): Fail<E> {
  return { ok: false, error };
}
