/**
 * railyard/errors
 *
 * The closed set of error kinds a Result can fail with, their factories and
 * type guards, and the algorithm that folds two errors into one.
 *
 * @example
 * ```typescript
 * import { validationFor, andField, notFound, combineErrors } from 'railyard';
 *
 * const invalid = andField(validationFor('email', 'Required'), 'age', 'Must be positive');
 * const missing = notFound('Order 42 does not exist', { instance: '/orders/42' });
 *
 * combineErrors(invalid, missing);
 * // { type: 'AGGREGATE_ERROR', errors: [invalid, missing], ... }
 * ```
 */

// =============================================================================
// Error Type Constants
// =============================================================================

export const VALIDATION_ERROR = "VALIDATION_ERROR" as const;
export const NOT_FOUND_ERROR = "NOT_FOUND_ERROR" as const;
export const CONFLICT_ERROR = "CONFLICT_ERROR" as const;
export const BAD_REQUEST_ERROR = "BAD_REQUEST_ERROR" as const;
export const UNAUTHORIZED_ERROR = "UNAUTHORIZED_ERROR" as const;
export const FORBIDDEN_ERROR = "FORBIDDEN_ERROR" as const;
export const DOMAIN_ERROR = "DOMAIN_ERROR" as const;
export const RATE_LIMIT_ERROR = "RATE_LIMIT_ERROR" as const;
export const SERVICE_UNAVAILABLE_ERROR = "SERVICE_UNAVAILABLE_ERROR" as const;
export const UNEXPECTED_ERROR = "UNEXPECTED_ERROR" as const;
export const AGGREGATE_ERROR = "AGGREGATE_ERROR" as const;

/**
 * Default machine-readable code for each error kind. A factory's `code`
 * option replaces it.
 */
export const DEFAULT_ERROR_CODES = Object.freeze({
  [VALIDATION_ERROR]: "validation.error",
  [NOT_FOUND_ERROR]: "not.found.error",
  [CONFLICT_ERROR]: "conflict.error",
  [BAD_REQUEST_ERROR]: "bad.request.error",
  [UNAUTHORIZED_ERROR]: "unauthorized.error",
  [FORBIDDEN_ERROR]: "forbidden.error",
  [DOMAIN_ERROR]: "domain.error",
  [RATE_LIMIT_ERROR]: "rate.limit.error",
  [SERVICE_UNAVAILABLE_ERROR]: "service.unavailable.error",
  [UNEXPECTED_ERROR]: "unexpected.error",
  [AGGREGATE_ERROR]: "aggregate.error",
} as const);

// =============================================================================
// Types
// =============================================================================

type ErrorBase<Type extends string> = {
  readonly type: Type;
  readonly message: string;
  readonly code: string;
  /** The resource the error refers to, e.g. `/orders/42`. */
  readonly instance?: string;
};

export type FieldError = {
  readonly field: string;
  readonly details: readonly string[];
};

export type ValidationError = ErrorBase<typeof VALIDATION_ERROR> & {
  readonly fieldErrors: readonly FieldError[];
};
export type NotFoundError = ErrorBase<typeof NOT_FOUND_ERROR>;
export type ConflictError = ErrorBase<typeof CONFLICT_ERROR>;
export type BadRequestError = ErrorBase<typeof BAD_REQUEST_ERROR>;
export type UnauthorizedError = ErrorBase<typeof UNAUTHORIZED_ERROR>;
export type ForbiddenError = ErrorBase<typeof FORBIDDEN_ERROR>;
export type DomainError = ErrorBase<typeof DOMAIN_ERROR>;
export type RateLimitError = ErrorBase<typeof RATE_LIMIT_ERROR> & {
  readonly retryAfterMs?: number;
};
export type ServiceUnavailableError = ErrorBase<typeof SERVICE_UNAVAILABLE_ERROR> & {
  readonly retryAfterMs?: number;
};
export type UnexpectedError = ErrorBase<typeof UNEXPECTED_ERROR> & {
  readonly cause?: unknown;
};

/** Every error kind except the aggregate. */
export type LeafError =
  | ValidationError
  | NotFoundError
  | ConflictError
  | BadRequestError
  | UnauthorizedError
  | ForbiddenError
  | DomainError
  | RateLimitError
  | ServiceUnavailableError
  | UnexpectedError;

/**
 * Several unrelated failures reported together, in the order they occurred.
 * Never contains another aggregate.
 */
export type AggregatedError = ErrorBase<typeof AGGREGATE_ERROR> & {
  readonly errors: readonly LeafError[];
};

export type AppError = LeafError | AggregatedError;

export type ErrorType = AppError["type"];

/**
 * Narrows the error union to a single kind by its type constant.
 *
 * @example
 * ```typescript
 * type E = ErrorOfType<typeof NOT_FOUND_ERROR>; // NotFoundError
 * ```
 */
export type ErrorOfType<K extends ErrorType> = Extract<AppError, { type: K }>;

export type AppErrorOptions = {
  code?: string;
  instance?: string;
};

export type RetryableErrorOptions = AppErrorOptions & {
  retryAfterMs?: number;
};

export type UnexpectedErrorOptions = AppErrorOptions & {
  cause?: unknown;
};

// =============================================================================
// Contract Violations
// =============================================================================

/**
 * Thrown when a caller breaks an API contract: a missing argument, an empty
 * validation or aggregate error, or a `matchError` call with no handler for
 * the error it received. These are bugs, not failures to put on a Result.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

// =============================================================================
// Factories
// =============================================================================

function base<Type extends ErrorType>(
  type: Type,
  message: string,
  options: AppErrorOptions | undefined
): ErrorBase<Type> {
  return {
    type,
    message,
    code: options?.code ?? DEFAULT_ERROR_CODES[type],
    ...(options?.instance !== undefined ? { instance: options.instance } : {}),
  };
}

function retryAfter(options: RetryableErrorOptions | undefined): { retryAfterMs?: number } {
  return options?.retryAfterMs !== undefined ? { retryAfterMs: options.retryAfterMs } : {};
}

/**
 * Creates a field error. At least one detail is required.
 *
 * @throws {ContractViolationError} When `details` is empty
 */
export function fieldError(field: string, details: readonly string[]): FieldError {
  if (details.length === 0) {
    throw new ContractViolationError(`Field error for "${field}" needs at least one detail`);
  }
  return { field, details: [...details] };
}

/** Renders a field error as `email: Required, Invalid format`. */
export function formatFieldError(error: FieldError): string {
  return `${error.field}: ${error.details.join(", ")}`;
}

/**
 * Creates a validation error from a list of field errors.
 *
 * When no message is given it is built from the field errors, e.g.
 * `email: Required; age: Must be positive`.
 *
 * @throws {ContractViolationError} When `fieldErrors` is empty or a field error has no details
 */
export function validationFrom(
  fieldErrors: readonly FieldError[],
  message?: string,
  options?: AppErrorOptions
): ValidationError {
  if (fieldErrors.length === 0) {
    throw new ContractViolationError("Validation error needs at least one field error");
  }
  const fields = fieldErrors.map((f) => fieldError(f.field, f.details));
  return {
    ...base(VALIDATION_ERROR, message ?? fields.map(formatFieldError).join("; "), options),
    fieldErrors: fields,
  };
}

/**
 * Creates a validation error with a single message. `field` defaults to the
 * empty string, meaning the error concerns the object as a whole.
 *
 * @example
 * ```typescript
 * validation('too small');
 * // { type: 'VALIDATION_ERROR', message: 'too small', code: 'validation.error',
 * //   fieldErrors: [{ field: '', details: ['too small'] }] }
 * ```
 */
export function validation(message: string, field = "", options?: AppErrorOptions): ValidationError {
  return validationFrom([fieldError(field, [message])], message, options);
}

/**
 * Starts a validation error for one field. Chain more fields with {@link andField}.
 *
 * @example
 * ```typescript
 * const error = andField(validationFor('email', 'Required'), 'password', 'Too short', 'Missing digit');
 * error.fieldErrors;
 * // [{ field: 'email', details: ['Required'] },
 * //  { field: 'password', details: ['Too short', 'Missing digit'] }]
 * ```
 */
export function validationFor(field: string, detail: string, ...details: string[]): ValidationError {
  return validationFrom([fieldError(field, [detail, ...details])]);
}

/**
 * Returns a new validation error with another field appended. The message is
 * rebuilt when it was derived from the field errors and kept when it was
 * given explicitly.
 */
export function andField(
  error: ValidationError,
  field: string,
  detail: string,
  ...details: string[]
): ValidationError {
  const fieldErrors = [...error.fieldErrors, fieldError(field, [detail, ...details])];
  const derived = error.message === error.fieldErrors.map(formatFieldError).join("; ");
  return validationFrom(fieldErrors, derived ? undefined : error.message, {
    code: error.code,
    instance: error.instance,
  });
}

export const notFound = (message: string, options?: AppErrorOptions): NotFoundError =>
  base(NOT_FOUND_ERROR, message, options);

export const conflict = (message: string, options?: AppErrorOptions): ConflictError =>
  base(CONFLICT_ERROR, message, options);

export const badRequest = (message: string, options?: AppErrorOptions): BadRequestError =>
  base(BAD_REQUEST_ERROR, message, options);

export const unauthorized = (message: string, options?: AppErrorOptions): UnauthorizedError =>
  base(UNAUTHORIZED_ERROR, message, options);

export const forbidden = (message: string, options?: AppErrorOptions): ForbiddenError =>
  base(FORBIDDEN_ERROR, message, options);

export const domain = (message: string, options?: AppErrorOptions): DomainError =>
  base(DOMAIN_ERROR, message, options);

export const rateLimit = (message: string, options?: RetryableErrorOptions): RateLimitError => ({
  ...base(RATE_LIMIT_ERROR, message, options),
  ...retryAfter(options),
});

export const serviceUnavailable = (
  message: string,
  options?: RetryableErrorOptions
): ServiceUnavailableError => ({
  ...base(SERVICE_UNAVAILABLE_ERROR, message, options),
  ...retryAfter(options),
});

/**
 * Creates an unexpected error, usually wrapping something that was thrown.
 * The thrown value is kept as `cause`.
 */
export const unexpected = (message: string, options?: UnexpectedErrorOptions): UnexpectedError => ({
  ...base(UNEXPECTED_ERROR, message, options),
  ...(options?.cause !== undefined ? { cause: options.cause } : {}),
});

/**
 * Creates an aggregate of several errors. Aggregates passed in are unpacked,
 * so the result never nests. The message joins the member messages with `; `
 * unless one is given.
 *
 * @throws {ContractViolationError} When `errors` is empty
 */
export function aggregate(
  errors: readonly AppError[],
  message?: string,
  options?: AppErrorOptions
): AggregatedError {
  const leaves = errors.flatMap(unpack);
  if (leaves.length === 0) {
    throw new ContractViolationError("Aggregate error needs at least one error");
  }
  return {
    ...base(AGGREGATE_ERROR, message ?? leaves.map((e) => e.message).join("; "), options),
    errors: leaves,
  };
}

/**
 * Describes a thrown value for use as an error message.
 */
export function describeThrown(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  return String(cause);
}

// =============================================================================
// Type Guards
// =============================================================================

const ERROR_TYPES: ReadonlySet<string> = new Set(Object.keys(DEFAULT_ERROR_CODES));

/**
 * Checks whether a value is one of the railyard error kinds.
 */
export function isAppError(value: unknown): value is AppError {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || !("message" in value) || !("code" in value)) return false;
  return (
    typeof value.type === "string" &&
    ERROR_TYPES.has(value.type) &&
    typeof value.message === "string" &&
    typeof value.code === "string"
  );
}

const guard =
  <K extends ErrorType>(type: K) =>
  (value: unknown): value is ErrorOfType<K> =>
    isAppError(value) && value.type === type;

export const isValidationError = guard(VALIDATION_ERROR);
export const isNotFoundError = guard(NOT_FOUND_ERROR);
export const isConflictError = guard(CONFLICT_ERROR);
export const isBadRequestError = guard(BAD_REQUEST_ERROR);
export const isUnauthorizedError = guard(UNAUTHORIZED_ERROR);
export const isForbiddenError = guard(FORBIDDEN_ERROR);
export const isDomainError = guard(DOMAIN_ERROR);
export const isRateLimitError = guard(RATE_LIMIT_ERROR);
export const isServiceUnavailableError = guard(SERVICE_UNAVAILABLE_ERROR);
export const isUnexpectedError = guard(UNEXPECTED_ERROR);
export const isAggregatedError = guard(AGGREGATE_ERROR);

// =============================================================================
// Combination
// =============================================================================

/**
 * The leaf errors an error stands for: an aggregate's members, or the error
 * itself. A validation error is one entry however many fields it has.
 */
export function unpack(error: AppError): readonly LeafError[] {
  return error.type === AGGREGATE_ERROR ? error.errors : [error];
}

function mergeValidation(left: ValidationError, right: ValidationError): ValidationError {
  const instance = left.instance ?? right.instance;
  return {
    type: VALIDATION_ERROR,
    message: left.message === right.message ? left.message : `${left.message} | ${right.message}`,
    code: left.code,
    ...(instance !== undefined ? { instance } : {}),
    fieldErrors: [...left.fieldErrors, ...right.fieldErrors],
  };
}

/**
 * Folds two errors into one, left before right.
 *
 * - With no left error, the right error is returned as is.
 * - Two validation errors merge into one validation error: field errors are
 *   concatenated, the left code is kept, equal messages stay as they are and
 *   different ones are joined as `left | right`.
 * - Anything else becomes an aggregate of both sides' leaf errors. Aggregates
 *   are unpacked, never nested.
 *
 * @throws {ContractViolationError} When `right` is missing
 *
 * @example
 * ```typescript
 * combineErrors(undefined, e) === e; // true
 * combineErrors(notFound('a'), notFound('b')).type; // 'AGGREGATE_ERROR'
 * ```
 */
export function combineErrors(left: AppError | undefined, right: AppError): AppError {
  if (right == null) {
    throw new ContractViolationError("combineErrors requires an error on the right-hand side");
  }
  if (left == null) return right;
  if (left.type === VALIDATION_ERROR && right.type === VALIDATION_ERROR) {
    return mergeValidation(left, right);
  }
  return aggregate([left, right]);
}

/**
 * Merges two validation errors field by field, the way a form reports them.
 * Unlike {@link combineErrors}, which concatenates field errors, details for
 * the same field end up in one entry without duplicates.
 *
 * - A missing right error, or the left error itself, returns `left` as is.
 * - Fields keep the order in which they first appear, left before right.
 * - Equal codes and messages are kept once; different ones are joined with
 *   `|` and ` | ` respectively.
 * - The left instance wins over the right one.
 *
 * @example
 * ```typescript
 * mergeValidationErrors(validationFor('password', 'Too short'), validationFor('password', 'Missing digit'))
 *   .fieldErrors;
 * // [{ field: 'password', details: ['Too short', 'Missing digit'] }]
 * ```
 */
export function mergeValidationErrors(left: ValidationError, right?: ValidationError | null): ValidationError {
  if (right == null || right === left) return left;

  const fields = new Map<string, Set<string>>();
  for (const { field, details } of [...left.fieldErrors, ...right.fieldErrors]) {
    const seen = fields.get(field) ?? new Set<string>();
    for (const detail of details) seen.add(detail);
    fields.set(field, seen);
  }

  const instance = left.instance ?? right.instance;
  return {
    type: VALIDATION_ERROR,
    message: left.message === right.message ? left.message : `${left.message} | ${right.message}`,
    code: left.code === right.code ? left.code : `${left.code}|${right.code}`,
    ...(instance !== undefined ? { instance } : {}),
    fieldErrors: [...fields].map(([field, details]) => ({ field, details: [...details] })),
  };
}
