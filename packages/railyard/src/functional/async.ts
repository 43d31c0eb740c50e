/**
 * railyard/functional/async
 *
 * The combinators again, for Results that arrive as promises and steps that
 * return promises. Every function takes a Result or a promise of one and
 * always returns a promise.
 *
 * Each accepts optional `{ signal, onEvent }`. When the signal is aborted
 * before a continuation would run, the returned promise rejects with the
 * signal's reason and the continuation is skipped. Every combinator that
 * settles to a Result reports it to `onEvent` as a `result_observed` event
 * named after the combinator, e.g. `"bindAsync"`.
 *
 * @example
 * ```typescript
 * const receipt = await bindAsync(
 *   mapAsync(loadCart(cartId), (cart) => cart.items),
 *   (items) => chargeCard(items),
 *   { signal: request.signal }
 * );
 * ```
 */

import type { AppError, UnexpectedError } from "../errors";
import { ContractViolationError, describeThrown, unexpected } from "../errors";
import type { AsyncResult, MaybeAsyncResult, Result } from "../result";
import { err, ok } from "../result";
import type { RailwayEventHandler } from "../observe";
import { observe } from "../observe";
import type { ValueOf } from "./combine";
import { collect } from "./combine";
import type { MatchErrorHandlers } from "./index";
import { matchError } from "./index";

// =============================================================================
// Types
// =============================================================================

export type AsyncOptions = {
  signal?: AbortSignal;
  onEvent?: RailwayEventHandler;
};

type MaybePromise<T> = T | PromiseLike<T>;

/**
 * The tuple of success values for a tuple of maybe-async Results.
 */
export type AsyncValuesOf<T extends readonly MaybeAsyncResult<unknown, AppError>[]> = {
  -readonly [K in keyof T]: ValueOf<Awaited<T[K]>>;
};

export type FactoryValuesOf<T extends readonly (() => MaybeAsyncResult<unknown, AppError>)[]> = {
  -readonly [K in keyof T]: T[K] extends () => infer R ? ValueOf<Awaited<R>> : never;
};

function isErrorFactory<T, F extends AppError>(
  error: F | ((value: T) => MaybePromise<F>)
): error is (value: T) => MaybePromise<F> {
  return typeof error === "function";
}

const checkSignal = (options: AsyncOptions | undefined): void => {
  options?.signal?.throwIfAborted();
};

const failure = (cause: unknown): Result<never, UnexpectedError> =>
  err(unexpected(describeThrown(cause), { cause }));

/** Runs a combinator body and reports its outcome under `operation`. */
async function observed<T, E extends AppError>(
  operation: string,
  options: AsyncOptions | undefined,
  body: () => AsyncResult<T, E>
): AsyncResult<T, E> {
  return observe(await body(), operation, options?.onEvent);
}

/**
 * Awaits an input, turning a rejection into an {@link UnexpectedError} with
 * the rejection as `cause`.
 */
async function settle<T, E extends AppError>(
  input: MaybeAsyncResult<T, E>
): AsyncResult<T, E | UnexpectedError> {
  try {
    return await input;
  } catch (cause) {
    return failure(cause);
  }
}

// =============================================================================
// Sequential
// =============================================================================

export function bindAsync<T, U, E extends AppError, F extends AppError>(
  result: MaybeAsyncResult<T, E>,
  fn: (value: T) => MaybeAsyncResult<U, F>,
  options?: AsyncOptions
): AsyncResult<U, E | F> {
  return observed("bindAsync", options, async (): AsyncResult<U, E | F> => {
    const r = await result;
    if (!r.ok) return r;
    checkSignal(options);
    return fn(r.value);
  });
}

export function mapAsync<T, U, E extends AppError>(
  result: MaybeAsyncResult<T, E>,
  fn: (value: T) => MaybePromise<U>,
  options?: AsyncOptions
): AsyncResult<U, E> {
  return observed("mapAsync", options, async (): AsyncResult<U, E> => {
    const r = await result;
    if (!r.ok) return r;
    checkSignal(options);
    return ok(await fn(r.value));
  });
}

export function mapErrorAsync<T, E extends AppError, F extends AppError>(
  result: MaybeAsyncResult<T, E>,
  fn: (error: E) => MaybePromise<F>,
  options?: AsyncOptions
): AsyncResult<T, F> {
  return observed("mapErrorAsync", options, async (): AsyncResult<T, F> => {
    const r = await result;
    if (r.ok) return r;
    checkSignal(options);
    return err(await fn(r.error));
  });
}

export function ensureAsync<T, E extends AppError, F extends AppError>(
  result: MaybeAsyncResult<T, E>,
  predicate: (value: T) => MaybePromise<boolean>,
  error: F | ((value: T) => MaybePromise<F>),
  options?: AsyncOptions
): AsyncResult<T, E | F> {
  return observed("ensureAsync", options, async (): AsyncResult<T, E | F> => {
    const r = await result;
    if (!r.ok) return r;
    checkSignal(options);
    if (await predicate(r.value)) return r;
    return err(isErrorFactory(error) ? await error(r.value) : error);
  });
}

/**
 * Async {@link compensate}: replaces a failure with the outcome of `fn`, or,
 * given a predicate first, only the failures it accepts.
 */
export function compensateAsync<T, E extends AppError, F extends AppError>(
  result: MaybeAsyncResult<T, E>,
  fn: (error: E) => MaybeAsyncResult<T, F>,
  options?: AsyncOptions
): AsyncResult<T, F>;
export function compensateAsync<T, E extends AppError, F extends AppError>(
  result: MaybeAsyncResult<T, E>,
  predicate: (error: E) => MaybePromise<boolean>,
  fn: (error: E) => MaybeAsyncResult<T, F>,
  options?: AsyncOptions
): AsyncResult<T, E | F>;
export function compensateAsync<T, E extends AppError, F extends AppError>(
  result: MaybeAsyncResult<T, E>,
  first: (error: E) => MaybePromise<boolean> | MaybeAsyncResult<T, F>,
  second?: ((error: E) => MaybeAsyncResult<T, F>) | AsyncOptions,
  third?: AsyncOptions
): AsyncResult<T, E | F> {
  const options = typeof second === "function" ? third : second;
  return observed("compensateAsync", options, async (): AsyncResult<T, E | F> => {
    const r = await result;
    if (r.ok) return r;
    checkSignal(options);
    if (typeof second === "function") {
      return (await first(r.error)) === true ? second(r.error) : r;
    }
    const outcome = await first(r.error);
    if (typeof outcome === "boolean") {
      throw new ContractViolationError("compensateAsync expects a Result from its compensation function");
    }
    return outcome;
  });
}

export function tapAsync<T, E extends AppError>(
  result: MaybeAsyncResult<T, E>,
  fn: (value: T) => unknown,
  options?: AsyncOptions
): AsyncResult<T, E> {
  return observed("tapAsync", options, async (): AsyncResult<T, E> => {
    const r = await result;
    if (r.ok) {
      checkSignal(options);
      await fn(r.value);
    }
    return r;
  });
}

export function tapErrorAsync<T, E extends AppError>(
  result: MaybeAsyncResult<T, E>,
  fn: (error: E) => unknown,
  options?: AsyncOptions
): AsyncResult<T, E> {
  return observed("tapErrorAsync", options, async (): AsyncResult<T, E> => {
    const r = await result;
    if (!r.ok) {
      checkSignal(options);
      await fn(r.error);
    }
    return r;
  });
}

export async function matchAsync<T, E extends AppError, R>(
  result: MaybeAsyncResult<T, E>,
  handlers: { ok: (value: T) => MaybePromise<R>; err: (error: E) => MaybePromise<R> },
  options?: AsyncOptions
): Promise<R> {
  const r = await result;
  checkSignal(options);
  return r.ok ? handlers.ok(r.value) : handlers.err(r.error);
}

export async function matchErrorAsync<T, R>(
  result: MaybeAsyncResult<T, AppError>,
  handlers: MatchErrorHandlers<T, MaybePromise<R>>,
  options?: AsyncOptions
): Promise<R> {
  const r = await result;
  checkSignal(options);
  return matchError(r, handlers);
}

// =============================================================================
// Collections
// =============================================================================

/**
 * Async {@link combine}. Inputs settle concurrently; errors are folded in
 * input order, whatever order they settled in. A rejected input counts as an
 * {@link UnexpectedError}.
 */
export function combineAsync<T extends readonly MaybeAsyncResult<unknown, AppError>[]>(
  ...inputs: T
): AsyncResult<AsyncValuesOf<T>, AppError> {
  return combineAsyncWith({}, ...inputs);
}

/**
 * {@link combineAsync} with options. The signal is checked once, before
 * waiting on the inputs.
 *
 * @example
 * ```typescript
 * const form = await combineAsyncWith({ onEvent: log }, checkEmail(email), checkUsername(name));
 * ```
 */
export function combineAsyncWith<T extends readonly MaybeAsyncResult<unknown, AppError>[]>(
  options: AsyncOptions,
  ...inputs: T
): AsyncResult<AsyncValuesOf<T>, AppError> {
  return observed("combineAsync", options, async (): AsyncResult<AsyncValuesOf<T>, AppError> => {
    checkSignal(options);
    const settled = await Promise.all(inputs.map((input) => settle(input)));
    return collect(settled) as Result<AsyncValuesOf<T>, AppError>;
  });
}

/**
 * Starts every factory at once and combines the outcomes by position, like
 * {@link combineAsync}. A factory that throws synchronously counts as an
 * {@link UnexpectedError}; the others still run.
 *
 * @example
 * ```typescript
 * const [user, orders] = unwrap(
 *   await parallel(
 *     () => fetchUser(id),
 *     () => fetchOrders(id)
 *   )
 * );
 * ```
 */
export function parallel<T extends readonly (() => MaybeAsyncResult<unknown, AppError>)[]>(
  ...factories: T
): AsyncResult<FactoryValuesOf<T>, AppError> {
  return parallelWith({}, ...factories);
}

/**
 * {@link parallel} with options. An aborted signal rejects before any
 * factory is started.
 */
export function parallelWith<T extends readonly (() => MaybeAsyncResult<unknown, AppError>)[]>(
  options: AsyncOptions,
  ...factories: T
): AsyncResult<FactoryValuesOf<T>, AppError> {
  return observed("parallel", options, async (): AsyncResult<FactoryValuesOf<T>, AppError> => {
    checkSignal(options);
    const started = factories.map((factory) => {
      try {
        return settle(factory());
      } catch (cause) {
        return Promise.resolve(failure(cause));
      }
    });
    const settled = await Promise.all(started);
    return collect(settled) as Result<FactoryValuesOf<T>, AppError>;
  });
}

/**
 * Async {@link traverse}: one item at a time, in order, stopping at the first
 * failure. The signal is checked before each item.
 */
export function traverseAsync<T, U, E extends AppError>(
  items: Iterable<T>,
  fn: (item: T, index: number) => MaybeAsyncResult<U, E>,
  options?: AsyncOptions
): AsyncResult<U[], E> {
  return observed("traverseAsync", options, async (): AsyncResult<U[], E> => {
    const values: U[] = [];
    let index = 0;
    for (const item of items) {
      checkSignal(options);
      const r = await fn(item, index++);
      if (!r.ok) return r;
      values.push(r.value);
    }
    return ok(values);
  });
}
