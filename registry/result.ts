/** Successful outcome */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/** Failed outcome */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Outcome of an operation whose failure is expected and recoverable.
 * Narrow on `ok` to access `value` or `error`.
 */
export type Result<T, E> = Ok<T> | Err<E>;

/** Wrap a successful value, if any */
export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok(value?: unknown): Ok<unknown> {
  return { ok: true, value };
}

/** Wrap an error */
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/**
 * Extract a successful value
 *
 * @param res Outcome to unwrap
 *
 * @throws the wrapped error if `res` is a failure
 */
export const unwrap = <T, E>(res: Result<T, E>): T => {
  if (!res.ok) throw res.error;
  return res.value;
};
