export interface Ok<T> {
  ok: true;
  value: T;
}
export interface Err<E> {
  ok: false;
  error: E;
}
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

export function map<T, U, E>(r: Result<T, E>, fn: (t: T) => U): Result<U, E> {
  return r.ok ? ok(fn(r.value)) : r;
}

export function mapErr<T, E, F>(
  r: Result<T, E>,
  fn: (e: E) => F
): Result<T, F> {
  return r.ok ? r : err(fn(r.error));
}

export function andThen<T, U, E>(
  r: Result<T, E>,
  fn: (t: T) => Result<U, E>
): Result<U, E> {
  return r.ok ? fn(r.value) : r;
}

export const unwrapOr = <T, E>(r: Result<T, E>, fallback: T): T =>
  r.ok ? r.value : fallback;

/**
 * Runs `fn` and captures an exception of the expected class as `Err`.
 * Anything else is rethrown untouched.
 */
export function capture<T, E extends Error>(
  fn: () => T,
  errorClass: new (...args: never[]) => E
): Result<T, E> {
  try {
    return ok(fn());
  } catch (e) {
    if (e instanceof errorClass) return err(e);
    throw e;
  }
}
