/**
 * railyard
 *
 * Railway-oriented error handling: Results instead of exceptions, a closed
 * set of error kinds, and combinators that either short-circuit on the first
 * failure or collect every failure into one error.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Railyard, type AsyncResult, type AppError } from 'railyard';
 *
 * const { ok, err, bind, ensure, combine, validationFor, notFound } = Railyard;
 *
 * async function getUser(id: string): AsyncResult<User> {
 *   const user = await db.find(id);
 *   return user ? ok(user) : err(notFound(`User ${id} not found`, { instance: `/users/${id}` }));
 * }
 *
 * // Every bad field is reported, not just the first
 * const form = combine(
 *   ensure(ok(input.email), (e) => e.includes('@'), validationFor('email', 'Invalid format')),
 *   ensure(ok(input.age), (a) => a >= 18, validationFor('age', 'Must be an adult'))
 * );
 * ```
 *
 * ## Entry Points
 *
 * - `railyard` - Railyard namespace plus named exports of everything below
 * - `railyard/testing` - assertions, scripted mocks and builders for tests
 */

import * as result from "./result";
import * as errors from "./errors";
import * as functional from "./functional";
import { combine, combineWith, traverse } from "./functional/combine";
import {
  bindAsync,
  mapAsync,
  mapErrorAsync,
  ensureAsync,
  compensateAsync,
  tapAsync,
  tapErrorAsync,
  matchAsync,
  matchErrorAsync,
  combineAsync,
  combineAsyncWith,
  traverseAsync,
  parallel,
  parallelWith,
} from "./functional/async";
import { retry, DEFAULT_RETRY_OPTIONS, MAX_RETRY_DELAY } from "./retry";
import { observe } from "./observe";

// =============================================================================
// Railyard namespace (single export)
// =============================================================================

const Railyard = {
  ...result,
  ...errors,
  ...functional,
  combine,
  combineWith,
  traverse,
  bindAsync,
  mapAsync,
  mapErrorAsync,
  ensureAsync,
  compensateAsync,
  tapAsync,
  tapErrorAsync,
  matchAsync,
  matchErrorAsync,
  combineAsync,
  combineAsyncWith,
  traverseAsync,
  parallel,
  parallelWith,
  retry,
  DEFAULT_RETRY_OPTIONS,
  MAX_RETRY_DELAY,
  observe,
} as const;

export { Railyard };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export {
  ok,
  err,
  unit,
  okUnit,
  isOk,
  isErr,
  UnwrapError,
  unwrap,
  unwrapErr,
  unwrapOr,
  unwrapOrElse,
  from,
  fromPromise,
  tryAsync,
  fromNullable,
  successIf,
  failureIf,
} from "./result";

export {
  VALIDATION_ERROR,
  NOT_FOUND_ERROR,
  CONFLICT_ERROR,
  BAD_REQUEST_ERROR,
  UNAUTHORIZED_ERROR,
  FORBIDDEN_ERROR,
  DOMAIN_ERROR,
  RATE_LIMIT_ERROR,
  SERVICE_UNAVAILABLE_ERROR,
  UNEXPECTED_ERROR,
  AGGREGATE_ERROR,
  DEFAULT_ERROR_CODES,
  ContractViolationError,
  fieldError,
  formatFieldError,
  validation,
  validationFrom,
  validationFor,
  andField,
  notFound,
  conflict,
  badRequest,
  unauthorized,
  forbidden,
  domain,
  rateLimit,
  serviceUnavailable,
  unexpected,
  aggregate,
  describeThrown,
  isAppError,
  isValidationError,
  isNotFoundError,
  isConflictError,
  isBadRequestError,
  isUnauthorizedError,
  isForbiddenError,
  isDomainError,
  isRateLimitError,
  isServiceUnavailableError,
  isUnexpectedError,
  isAggregatedError,
  unpack,
  combineErrors,
  mergeValidationErrors,
} from "./errors";

export {
  identity,
  pipe,
  flow,
  bind,
  map,
  mapError,
  ensure,
  compensate,
  when,
  unless,
  tap,
  tapError,
  match,
  matchError,
  recover,
  getOrElse,
  R,
} from "./functional";

export { combine, combineWith, traverse } from "./functional/combine";

export {
  bindAsync,
  mapAsync,
  mapErrorAsync,
  ensureAsync,
  compensateAsync,
  tapAsync,
  tapErrorAsync,
  matchAsync,
  matchErrorAsync,
  combineAsync,
  combineAsyncWith,
  traverseAsync,
  parallel,
  parallelWith,
} from "./functional/async";

export { retry, DEFAULT_RETRY_OPTIONS, MAX_RETRY_DELAY } from "./retry";

export { observe, emit } from "./observe";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

export type { Ok, Err, Result, AsyncResult, MaybeAsyncResult, Unit } from "./result";

export type {
  AppError,
  LeafError,
  ErrorType,
  ErrorOfType,
  FieldError,
  ValidationError,
  NotFoundError,
  ConflictError,
  BadRequestError,
  UnauthorizedError,
  ForbiddenError,
  DomainError,
  RateLimitError,
  ServiceUnavailableError,
  UnexpectedError,
  AggregatedError,
  AppErrorOptions,
  RetryableErrorOptions,
  UnexpectedErrorOptions,
} from "./errors";

export type { MatchHandlers, MatchErrorHandlers } from "./functional";
export type { ValueOf, ErrorOf, ValuesOf } from "./functional/combine";
export type { AsyncOptions, AsyncValuesOf, FactoryValuesOf } from "./functional/async";
export type { RetryOptions, RetryContext } from "./retry";
export type {
  RailwayEvent,
  RailwayEventHandler,
  ResultObservedEvent,
  RetryAttemptEvent,
  RetryScheduledEvent,
  RetrySucceededEvent,
  RetryExhaustedEvent,
  RetryStoppedEvent,
  RetryCancelledEvent,
} from "./observe";
