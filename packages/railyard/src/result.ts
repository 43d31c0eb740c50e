/**
 * railyard/result
 *
 * The Result type: a value on the success track or an {@link AppError} on the
 * failure track, never both. Expected failures travel as values; only broken
 * contracts throw.
 */

import type { AppError, UnexpectedError } from "./errors";
import { ContractViolationError, describeThrown, unexpected } from "./errors";

// =============================================================================
// Types
// =============================================================================

export type Ok<T> = { readonly ok: true; readonly value: T };

export type Err<E extends AppError = AppError> = { readonly ok: false; readonly error: E };

/**
 * The outcome of an operation that can fail.
 *
 * @example
 * ```typescript
 * const parsePort = (raw: string): Result<number, ValidationError> => {
 *   const port = Number(raw);
 *   return Number.isInteger(port) ? ok(port) : err(validationFor('port', 'Must be an integer'));
 * };
 * ```
 */
export type Result<T, E extends AppError = AppError> = Ok<T> | Err<E>;

export type AsyncResult<T, E extends AppError = AppError> = Promise<Result<T, E>>;

/** A Result or a promise of one. Every async combinator accepts both. */
export type MaybeAsyncResult<T, E extends AppError = AppError> = Result<T, E> | Promise<Result<T, E>>;

/** The value type of a success that carries no information. */
export type Unit = undefined;

// =============================================================================
// Constructors
// =============================================================================

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 *
 * @throws {ContractViolationError} When `error` is missing; a failure always carries an error
 */
export const err = <E extends AppError>(error: E): Err<E> => {
  if (error == null) {
    throw new ContractViolationError("A failed Result needs an error");
  }
  return { ok: false, error };
};

/** A success with no value, for operations run only for their effect. */
export const unit: Ok<Unit> = Object.freeze(ok(undefined));

export const okUnit = (): Ok<Unit> => unit;

// =============================================================================
// Type Guards
// =============================================================================

export const isOk = <T, E extends AppError>(r: Result<T, E>): r is Ok<T> => r.ok;

export const isErr = <T, E extends AppError>(r: Result<T, E>): r is Err<E> => !r.ok;

// =============================================================================
// Unwrapping
// =============================================================================

/**
 * Thrown by {@link unwrap} and {@link unwrapErr} when the Result is on the
 * other track. Reading the wrong side of a Result is a bug in the caller.
 */
export class UnwrapError extends Error {
  constructor(
    message: string,
    public readonly error?: AppError
  ) {
    super(message);
    this.name = "UnwrapError";
  }
}

/**
 * Returns the success value.
 *
 * @remarks Only at boundaries or in tests, where a failure should be fatal.
 *
 * @throws {UnwrapError} If the Result is a failure (the error is attached)
 */
export const unwrap = <T, E extends AppError>(r: Result<T, E>): T => {
  if (r.ok) return r.value;
  throw new UnwrapError(`Unwrap called on a failed Result: ${r.error.message}`, r.error);
};

/**
 * Returns the error of a failed Result.
 *
 * @throws {UnwrapError} If the Result is a success
 */
export const unwrapErr = <T, E extends AppError>(r: Result<T, E>): E => {
  if (!r.ok) return r.error;
  throw new UnwrapError("unwrapErr called on a successful Result");
};

export const unwrapOr = <T, E extends AppError>(r: Result<T, E>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;

export const unwrapOrElse = <T, E extends AppError>(r: Result<T, E>, fn: (error: E) => T): T =>
  r.ok ? r.value : fn(r.error);

// =============================================================================
// Wrapping
// =============================================================================

const toUnexpected = (cause: unknown): UnexpectedError => unexpected(describeThrown(cause), { cause });

/**
 * Runs a function that may throw and captures the outcome as a Result.
 *
 * Without a mapper, anything thrown becomes an {@link UnexpectedError} whose
 * `cause` is the thrown value.
 *
 * @example
 * ```typescript
 * const parsed = from(() => JSON.parse(body));
 * const mapped = from(() => JSON.parse(body), () => badRequest('Body is not JSON'));
 * ```
 */
export function from<T>(fn: () => T): Result<T, UnexpectedError>;
export function from<T, E extends AppError>(fn: () => T, onError: (cause: unknown) => E): Result<T, E>;
export function from<T, E extends AppError>(
  fn: () => T,
  onError?: (cause: unknown) => E
): Result<T, E | UnexpectedError> {
  try {
    return ok(fn());
  } catch (cause) {
    return err(onError ? onError(cause) : toUnexpected(cause));
  }
}

/**
 * Awaits a promise and captures a rejection as a failed Result.
 */
export function fromPromise<T>(promise: PromiseLike<T>): AsyncResult<T, UnexpectedError>;
export function fromPromise<T, E extends AppError>(
  promise: PromiseLike<T>,
  onError: (cause: unknown) => E
): AsyncResult<T, E>;
export async function fromPromise<T, E extends AppError>(
  promise: PromiseLike<T>,
  onError?: (cause: unknown) => E
): AsyncResult<T, E | UnexpectedError> {
  try {
    return ok(await promise);
  } catch (cause) {
    return err(onError ? onError(cause) : toUnexpected(cause));
  }
}

/**
 * Like {@link fromPromise}, but takes a function so that a synchronous throw
 * before the promise exists is captured too.
 *
 * @example
 * ```typescript
 * const user = await tryAsync(
 *   () => db.users.findOrThrow(id),
 *   () => notFound(`User ${id} not found`, { instance: `/users/${id}` })
 * );
 * ```
 */
export function tryAsync<T>(fn: () => PromiseLike<T> | T): AsyncResult<T, UnexpectedError>;
export function tryAsync<T, E extends AppError>(
  fn: () => PromiseLike<T> | T,
  onError: (cause: unknown) => E
): AsyncResult<T, E>;
export async function tryAsync<T, E extends AppError>(
  fn: () => PromiseLike<T> | T,
  onError?: (cause: unknown) => E
): AsyncResult<T, E | UnexpectedError> {
  try {
    return ok(await fn());
  } catch (cause) {
    return err(onError ? onError(cause) : toUnexpected(cause));
  }
}

/**
 * Turns a possibly missing value into a Result. Only `null` and `undefined`
 * count as missing; `0`, `""` and `false` are values.
 */
export const fromNullable = <T, E extends AppError>(
  value: T | null | undefined,
  onNull: () => E
): Result<T, E> => (value == null ? err(onNull()) : ok(value));

/** Success with `value` when `condition` holds, otherwise failure with `error`. */
export const successIf = <T, E extends AppError>(condition: boolean, value: T, error: E): Result<T, E> =>
  condition ? ok(value) : err(error);

/** Failure with `error` when `condition` holds, otherwise success with `value`. */
export const failureIf = <T, E extends AppError>(condition: boolean, value: T, error: E): Result<T, E> =>
  condition ? err(error) : ok(value);
