/**
 * railyard/functional
 *
 * Sequential combinators. Each one decides whether to stay on the success
 * track or pass a failure through untouched; a step after a failure never
 * runs.
 *
 * @example
 * ```typescript
 * import { bind, map, ensure, pipe, R } from 'railyard';
 *
 * const total = map(
 *   ensure(parseQuantity(raw), (n) => n > 0, validationFor('quantity', 'Must be positive')),
 *   (n) => n * unitPrice
 * );
 *
 * const same = pipe(
 *   parseQuantity(raw),
 *   R.ensure((n: number) => n > 0, validationFor('quantity', 'Must be positive')),
 *   R.map((n: number) => n * unitPrice)
 * );
 * ```
 */

import type { AppError, ErrorOfType, ErrorType } from "../errors";
import {
  AGGREGATE_ERROR,
  BAD_REQUEST_ERROR,
  CONFLICT_ERROR,
  ContractViolationError,
  DOMAIN_ERROR,
  FORBIDDEN_ERROR,
  NOT_FOUND_ERROR,
  RATE_LIMIT_ERROR,
  SERVICE_UNAVAILABLE_ERROR,
  UNAUTHORIZED_ERROR,
  UNEXPECTED_ERROR,
  VALIDATION_ERROR,
} from "../errors";
import type { Result } from "../result";
import { err, ok } from "../result";

// =============================================================================
// Composition
// =============================================================================

export const identity = <A>(a: A): A => a;

/**
 * Passes a value through a sequence of functions, left to right.
 *
 * @example
 * ```typescript
 * pipe(ok(2), R.map((n: number) => n + 1), R.map((n: number) => n * 10)); // ok(30)
 * ```
 */
export function pipe<A>(a: A): A;
export function pipe<A, B>(a: A, ab: (a: A) => B): B;
export function pipe<A, B, C>(a: A, ab: (a: A) => B, bc: (b: B) => C): C;
export function pipe<A, B, C, D>(a: A, ab: (a: A) => B, bc: (b: B) => C, cd: (c: C) => D): D;
export function pipe<A, B, C, D, E>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): E;
export function pipe<A, B, C, D, E, F>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F
): F;
export function pipe<A, B, C, D, E, F, G>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G
): G;
export function pipe(a: unknown, ...fns: Array<(x: unknown) => unknown>): unknown {
  return fns.reduce((acc, fn) => fn(acc), a);
}

/**
 * Composes functions left to right into a new function.
 *
 * @example
 * ```typescript
 * const checkout = flow(validateCart, R.bind(reserveStock), R.map(toReceipt));
 * ```
 */
export function flow<A extends readonly unknown[], B>(ab: (...a: A) => B): (...a: A) => B;
export function flow<A extends readonly unknown[], B, C>(
  ab: (...a: A) => B,
  bc: (b: B) => C
): (...a: A) => C;
export function flow<A extends readonly unknown[], B, C, D>(
  ab: (...a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D
): (...a: A) => D;
export function flow<A extends readonly unknown[], B, C, D, E>(
  ab: (...a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): (...a: A) => E;
export function flow<A extends readonly unknown[], B, C, D, E, F>(
  ab: (...a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F
): (...a: A) => F;
export function flow(
  first: (...args: unknown[]) => unknown,
  ...rest: Array<(x: unknown) => unknown>
): (...args: unknown[]) => unknown {
  return (...args) => rest.reduce((acc, fn) => fn(acc), first(...args));
}

// =============================================================================
// Track Switching
// =============================================================================

/**
 * Chains a Result-returning step. A failure short-circuits: `fn` is not called
 * and the same failed Result comes back.
 */
export function bind<T, U, E extends AppError, F extends AppError>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, F>
): Result<U, E | F> {
  return result.ok ? fn(result.value) : result;
}

/** Transforms the success value. Failures pass through. */
export function map<T, U, E extends AppError>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/** Transforms the error. Successes pass through. */
export function mapError<T, E extends AppError, F extends AppError>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> {
  return result.ok ? result : err(fn(result.error));
}

function isErrorFactory<T, F extends AppError>(error: F | ((value: T) => F)): error is (value: T) => F {
  return typeof error === "function";
}

/**
 * Keeps a success only when `predicate` holds for its value; otherwise fails
 * with `error`, or with what `error(value)` returns.
 *
 * @example
 * ```typescript
 * ensure(ok(5), (x) => x > 10, validation('too small'));
 * // { ok: false, error: { type: 'VALIDATION_ERROR', message: 'too small', ... } }
 * ```
 */
export function ensure<T, E extends AppError, F extends AppError>(
  result: Result<T, E>,
  predicate: (value: T) => boolean,
  error: F | ((value: T) => F)
): Result<T, E | F> {
  if (!result.ok || predicate(result.value)) return result;
  return err(isErrorFactory(error) ? error(result.value) : error);
}

/**
 * Replaces a failure with the outcome of `fn`.
 *
 * With a predicate, only failures the predicate accepts are compensated; the
 * rest pass through untouched.
 *
 * @example
 * ```typescript
 * compensate(loadFromCache(key), () => loadFromDb(key));
 * compensate(loadUser(id), isNotFoundError, () => ok(guestUser));
 * ```
 */
export function compensate<T, E extends AppError, F extends AppError>(
  result: Result<T, E>,
  fn: (error: E) => Result<T, F>
): Result<T, F>;
export function compensate<T, E extends AppError, F extends AppError>(
  result: Result<T, E>,
  predicate: (error: E) => boolean,
  fn: (error: E) => Result<T, F>
): Result<T, E | F>;
export function compensate<T, E extends AppError, F extends AppError>(
  result: Result<T, E>,
  first: (error: E) => boolean | Result<T, F>,
  fn?: (error: E) => Result<T, F>
): Result<T, E | F> {
  if (result.ok) return result;
  const outcome = first(result.error);
  if (fn) return outcome === true ? fn(result.error) : result;
  if (typeof outcome === "boolean") {
    throw new ContractViolationError("compensate expects a Result from its compensation function");
  }
  return outcome;
}

/**
 * Runs `fn` on a success value when `predicate` holds. The step's Result
 * replaces the input; when the predicate does not hold the input passes
 * through.
 */
export function when<T, E extends AppError, F extends AppError>(
  result: Result<T, E>,
  predicate: (value: T) => boolean,
  fn: (value: T) => Result<T, F>
): Result<T, E | F> {
  return result.ok && predicate(result.value) ? fn(result.value) : result;
}

/** The inverse of {@link when}: runs `fn` when `predicate` does not hold. */
export function unless<T, E extends AppError, F extends AppError>(
  result: Result<T, E>,
  predicate: (value: T) => boolean,
  fn: (value: T) => Result<T, F>
): Result<T, E | F> {
  return when(result, (value) => !predicate(value), fn);
}

// =============================================================================
// Side Effects
// =============================================================================

/** Runs `fn` on a success value and returns the input Result. */
export function tap<T, E extends AppError>(result: Result<T, E>, fn: (value: T) => unknown): Result<T, E> {
  if (result.ok) fn(result.value);
  return result;
}

/** Runs `fn` on the error and returns the input Result. */
export function tapError<T, E extends AppError>(
  result: Result<T, E>,
  fn: (error: E) => unknown
): Result<T, E> {
  if (!result.ok) fn(result.error);
  return result;
}

// =============================================================================
// Leaving the Railway
// =============================================================================

export type MatchHandlers<T, E, R> = {
  ok: (value: T) => R;
  err: (error: E) => R;
};

export function match<T, E extends AppError, R>(result: Result<T, E>, handlers: MatchHandlers<T, E, R>): R {
  return result.ok ? handlers.ok(result.value) : handlers.err(result.error);
}

/**
 * Handlers for {@link matchError}: `ok` for the success value, one optional
 * handler per error type constant, and `err` as the catch-all.
 */
export type MatchErrorHandlers<T, R> = {
  ok: (value: T) => R;
  err?: (error: AppError) => R;
} & { [K in ErrorType]?: (error: ErrorOfType<K>) => R };

/**
 * Dispatches on the kind of error. The handler for the error's type wins over
 * the catch-all `err`.
 *
 * @throws {ContractViolationError} When neither a matching handler nor `err` is given
 *
 * @example
 * ```typescript
 * const status = matchError(result, {
 *   ok: () => 200,
 *   NOT_FOUND_ERROR: () => 404,
 *   VALIDATION_ERROR: (e) => (e.fieldErrors.length > 1 ? 422 : 400),
 *   err: () => 500,
 * });
 * ```
 */
export function matchError<T, R>(result: Result<T, AppError>, handlers: MatchErrorHandlers<T, R>): R {
  if (result.ok) return handlers.ok(result.value);
  const error = result.error;
  switch (error.type) {
    case VALIDATION_ERROR:
      if (handlers.VALIDATION_ERROR) return handlers.VALIDATION_ERROR(error);
      break;
    case NOT_FOUND_ERROR:
      if (handlers.NOT_FOUND_ERROR) return handlers.NOT_FOUND_ERROR(error);
      break;
    case CONFLICT_ERROR:
      if (handlers.CONFLICT_ERROR) return handlers.CONFLICT_ERROR(error);
      break;
    case BAD_REQUEST_ERROR:
      if (handlers.BAD_REQUEST_ERROR) return handlers.BAD_REQUEST_ERROR(error);
      break;
    case UNAUTHORIZED_ERROR:
      if (handlers.UNAUTHORIZED_ERROR) return handlers.UNAUTHORIZED_ERROR(error);
      break;
    case FORBIDDEN_ERROR:
      if (handlers.FORBIDDEN_ERROR) return handlers.FORBIDDEN_ERROR(error);
      break;
    case DOMAIN_ERROR:
      if (handlers.DOMAIN_ERROR) return handlers.DOMAIN_ERROR(error);
      break;
    case RATE_LIMIT_ERROR:
      if (handlers.RATE_LIMIT_ERROR) return handlers.RATE_LIMIT_ERROR(error);
      break;
    case SERVICE_UNAVAILABLE_ERROR:
      if (handlers.SERVICE_UNAVAILABLE_ERROR) return handlers.SERVICE_UNAVAILABLE_ERROR(error);
      break;
    case UNEXPECTED_ERROR:
      if (handlers.UNEXPECTED_ERROR) return handlers.UNEXPECTED_ERROR(error);
      break;
    case AGGREGATE_ERROR:
      if (handlers.AGGREGATE_ERROR) return handlers.AGGREGATE_ERROR(error);
      break;
  }
  if (handlers.err) return handlers.err(error);
  throw new ContractViolationError(`matchError has no handler for ${error.type} and no err fallback`);
}

/** Turns a failure back into a value. */
export function recover<T, E extends AppError>(result: Result<T, E>, fn: (error: E) => T): T {
  return result.ok ? result.value : fn(result.error);
}

export function getOrElse<T, E extends AppError>(result: Result<T, E>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue;
}

// =============================================================================
// R Namespace (curried, for pipe and flow)
// =============================================================================

/**
 * Curried forms of the combinators: configure first, apply to a Result later.
 */
export const R = {
  bind:
    <T, U, F extends AppError>(fn: (value: T) => Result<U, F>) =>
    <E extends AppError>(result: Result<T, E>): Result<U, E | F> =>
      bind(result, fn),

  map:
    <T, U>(fn: (value: T) => U) =>
    <E extends AppError>(result: Result<T, E>): Result<U, E> =>
      map(result, fn),

  mapError:
    <E extends AppError, F extends AppError>(fn: (error: E) => F) =>
    <T>(result: Result<T, E>): Result<T, F> =>
      mapError(result, fn),

  ensure:
    <T, F extends AppError>(predicate: (value: T) => boolean, error: F | ((value: T) => F)) =>
    <E extends AppError>(result: Result<T, E>): Result<T, E | F> =>
      ensure(result, predicate, error),

  compensate:
    <T, E extends AppError, F extends AppError>(fn: (error: E) => Result<T, F>) =>
    (result: Result<T, E>): Result<T, F> =>
      compensate(result, fn),

  tap:
    <T>(fn: (value: T) => unknown) =>
    <E extends AppError>(result: Result<T, E>): Result<T, E> =>
      tap(result, fn),

  tapError:
    <E extends AppError>(fn: (error: E) => unknown) =>
    <T>(result: Result<T, E>): Result<T, E> =>
      tapError(result, fn),

  match:
    <T, E extends AppError, R>(handlers: MatchHandlers<T, E, R>) =>
    (result: Result<T, E>): R =>
      match(result, handlers),

  recover:
    <T, E extends AppError>(fn: (error: E) => T) =>
    (result: Result<T, E>): T =>
      recover(result, fn),

  getOrElse:
    <T>(defaultValue: T) =>
    <E extends AppError>(result: Result<T, E>): T =>
      getOrElse(result, defaultValue),
} as const;
