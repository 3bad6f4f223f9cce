/**
 * Expected failures (bad facts, unreadable checkpoints, a run already in
 * progress) are returned as values. Throws are left for programmer errors.
 */
export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Run a synchronous I/O step and return whatever it throws as an Err. */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (thrown) {
    return Err(toError(thrown));
  }
}

/** Thrown values are not always Errors (`throw "x"`); normalize them. */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
