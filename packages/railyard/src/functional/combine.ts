/**
 * railyard/functional/combine
 *
 * Combining several Results. `combine` and its relatives look at every input
 * and report every failure; `traverse` stops at the first one.
 */

import type { AppError } from "../errors";
import { combineErrors } from "../errors";
import type { Err, Ok, Result } from "../result";
import { err, ok } from "../result";

// =============================================================================
// Types
// =============================================================================

/** The success value type of a Result type. */
export type ValueOf<R> = R extends Ok<infer V> ? V : never;

/**
 * The error type of a Result type.
 */
export type ErrorOf<R> = R extends Err<infer E> ? E : never;

/**
 * The tuple of success values for a tuple of Results.
 *
 * @example
 * ```typescript
 * type V = ValuesOf<[Result<number>, Result<string>]>; // [number, string]
 * ```
 */
export type ValuesOf<T extends readonly Result<unknown, AppError>[]> = {
  -readonly [K in keyof T]: ValueOf<T[K]>;
};

// =============================================================================
// Accumulating
// =============================================================================

/**
 * Folds a list of Results: all values in input order, or every error folded
 * left to right with {@link combineErrors}.
 *
 * @internal
 */
export function collect(results: readonly Result<unknown, AppError>[]): Result<unknown[], AppError> {
  const values: unknown[] = [];
  let error: AppError | undefined;
  for (const result of results) {
    if (result.ok) {
      values.push(result.value);
    } else {
      error = combineErrors(error, result.error);
    }
  }
  return error === undefined ? ok(values) : err(error);
}

/**
 * Combines Results into one Result of a tuple. Every input is inspected:
 * the failure carries all of their errors, validation errors merged and
 * everything else gathered into an aggregate.
 *
 * With no inputs the result is `ok([])`.
 *
 * @example
 * ```typescript
 * const form = combine(parseEmail(input.email), parseAge(input.age));
 * // ok(['a@example.com', 30]), or one error describing every bad field
 *
 * combine(err(notFound('a')), err(notFound('b')));
 * // err({ type: 'AGGREGATE_ERROR', errors: [notFound('a'), notFound('b')], ... })
 * ```
 */
export function combine<T extends readonly Result<unknown, AppError>[]>(
  ...results: T
): Result<ValuesOf<T>, AppError> {
  return collect(results) as Result<ValuesOf<T>, AppError>;
}

/**
 * Appends one more Result to a Result of a tuple, reporting the errors of
 * both sides when both failed.
 *
 * @example
 * ```typescript
 * const pair = combineWith(ok([1] as [number]), ok('a')); // ok([1, 'a'])
 * ```
 */
export function combineWith<A extends readonly unknown[], B>(
  tuple: Result<A, AppError>,
  next: Result<B, AppError>
): Result<[...A, B], AppError> {
  if (!tuple.ok) return err(next.ok ? tuple.error : combineErrors(tuple.error, next.error));
  if (!next.ok) return next;
  return ok([...tuple.value, next.value]);
}

// =============================================================================
// Short-circuiting
// =============================================================================

/**
 * Applies `fn` to each item in order and collects the values. Stops at the
 * first failure; later items are never passed to `fn`.
 */
export function traverse<T, U, E extends AppError>(
  items: Iterable<T>,
  fn: (item: T, index: number) => Result<U, E>
): Result<U[], E> {
  const values: U[] = [];
  let index = 0;
  for (const item of items) {
    const result = fn(item, index++);
    if (!result.ok) return result;
    values.push(result.value);
  }
  return ok(values);
}
