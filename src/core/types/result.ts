/**
 * Result monad: eliminates throw-based control flow.
 * Every fallible step of the pipeline returns Result<T, E> instead of throwing.
 */

export type Result<T, E> = Ok<T> | Err<E>;

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

/** Map over the failure value */
export const mapErr = <T, E, F>(result: Result<T, E>, fn: (e: E) => F): Result<T, F> =>
  result.ok ? result : err(fn(result.error));

/**
 * Run user code that may either throw or hand back its own Result, folding
 * both shapes into one Result.
 */
export const settle = async <T>(
  fn: () => Promise<Result<T, unknown>> | Result<T, unknown>,
): Promise<Result<T, unknown>> => {
  try {
    return await fn();
  } catch (e: unknown) {
    return err(e);
  }
};

/** Wrap an async throwing function into a Result */
export const tryCatchAsync = async <T>(fn: () => Promise<T>): Promise<Result<T, unknown>> => {
  try {
    return ok(await fn());
  } catch (e: unknown) {
    return err(e);
  }
};
