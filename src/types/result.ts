// Explicit success/failure values for bus operations that must not throw.

export type Result<T, E = Error> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly success: true;
  readonly data: T;
}

export interface Err<E> {
  readonly success: false;
  readonly error: E;
}

export function ok<T>(data: T): Ok<T> {
  return { data, success: true };
}

export function err<E>(error: E): Err<E> {
  return { error, success: false };
}
