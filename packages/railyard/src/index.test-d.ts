/**
 * Type tests for railyard
 * Checked by `tsc --noEmit`; run with tsd for exact-type assertions.
 */
/* eslint-disable @typescript-eslint/no-unused-vars */
import { expectType } from "tsd";
import {
  Railyard,
  type AggregatedError,
  type AppError,
  type AsyncResult,
  type ErrorOfType,
  type NotFoundError,
  type Result,
  type UnexpectedError,
  type ValidationError,
  NOT_FOUND_ERROR,
} from "./index";
import { expectErrorType } from "./testing-entry";

const {
  ok,
  err,
  bind,
  map,
  mapError,
  ensure,
  combine,
  combineWith,
  traverse,
  combineAsync,
  parallel,
  parallelWith,
  combineAsyncWith,
  mergeValidationErrors,
  validationFor,
  from,
  fromNullable,
  matchError,
  retry,
  notFound,
  validation,
  domain,
  combineErrors,
  aggregate,
} = Railyard;

// =============================================================================
// Constructors
// =============================================================================

expectType<{ readonly ok: true; readonly value: number }>(ok(1));
expectType<{ readonly ok: false; readonly error: NotFoundError }>(err(notFound("a")));

// =============================================================================
// Error types flow through the combinators
// =============================================================================

declare const user: Result<{ id: string }, NotFoundError>;
declare const loadOrders: (id: string) => Result<string[], ValidationError>;

expectType<Result<string[], NotFoundError | ValidationError>>(bind(user, (u) => loadOrders(u.id)));
expectType<Result<string, NotFoundError>>(map(user, (u) => u.id));
expectType<Result<{ id: string }, ValidationError>>(mapError(user, (e) => validation(e.message)));
expectType<Result<{ id: string }, NotFoundError | ValidationError>>(
  ensure(user, (u) => u.id !== "", validation("empty id"))
);

// =============================================================================
// Combining keeps the tuple shape
// =============================================================================

declare const email: Result<string>;
declare const age: Result<number>;

expectType<Result<[string, number], AppError>>(combine(email, age));
expectType<Result<[string, number, boolean], AppError>>(combineWith(combine(email, age), ok(true)));
expectType<Result<number[], ValidationError>>(traverse(["1"], (): Result<number, ValidationError> => ok(1)));

expectType<Promise<Result<[string, number], AppError>>>(combineAsync(email, Promise.resolve(age)));
expectType<AsyncResult<[string, number], AppError>>(
  parallel(
    () => email,
    async () => age
  )
);

expectType<AsyncResult<[string, number], AppError>>(combineAsyncWith({ onEvent: () => undefined }, email, age));
expectType<AsyncResult<[string], AppError>>(parallelWith({}, () => email));

// =============================================================================
// Wrapping and matching
// =============================================================================

expectType<Result<number, UnexpectedError>>(from(() => 1));
declare const nickname: string | null;
expectType<Result<string, NotFoundError>>(fromNullable(nickname, () => notFound("missing")));

expectType<number>(
  matchError(user, {
    ok: () => 1,
    NOT_FOUND_ERROR: (e) => {
      expectType<NotFoundError>(e);
      return 2;
    },
    err: () => 3,
  })
);

expectType<ErrorOfType<typeof NOT_FOUND_ERROR>>(expectErrorType(user, NOT_FOUND_ERROR));

// =============================================================================
// Error combination
// =============================================================================

expectType<AppError>(combineErrors(undefined, domain("x")));
expectType<AggregatedError>(aggregate([notFound("a"), domain("b")]));
expectType<ValidationError>(mergeValidationErrors(validationFor("a", "x"), validationFor("a", "y")));

// =============================================================================
// Retry keeps the operation's types
// =============================================================================

expectType<AsyncResult<{ id: string }, NotFoundError>>(retry(() => user));
