/**
 * Result monad — the outcome of an execution without throw-based control flow.
 * `execute` resolves to Result<T, E> instead of rejecting on operation failure.
 */

export type Result<T, E = unknown> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/** Map over the success value */
export const map = <T, U, E>(result: Result<T, E>, fn: (v: T) => U): Result<U, E> =>
  result.ok ? ok(fn(result.value)) : result;

/** Unwrap with a default */
export const unwrapOr = <T, E>(result: Result<T, E>, fallback: T): T =>
  result.ok ? result.value : fallback;

/** Wrap a sync-or-async throwing function into a Result */
export const tryCatchAsync = async <T>(fn: () => T | Promise<T>): Promise<Result<T, unknown>> => {
  try {
    return ok(await fn());
  } catch (e: unknown) {
    return err(e);
  }
};
