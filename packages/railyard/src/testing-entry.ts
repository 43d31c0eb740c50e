/**
 * railyard/testing
 *
 * Helpers for testing code that returns Results.
 *
 * @example
 * ```typescript
 * import { unwrapOk, expectErrorType, createMockFn, ValidationErrorBuilder } from 'railyard/testing';
 *
 * expect(unwrapOk(parseAge('42'))).toBe(42);
 *
 * const error = expectErrorType(register({ email: '' }), VALIDATION_ERROR);
 * expect(error).toEqual(ValidationErrorBuilder.create().withFieldError('email', 'Required').build());
 * ```
 */

export {
  type MockFunction,
  expectOk,
  expectErr,
  unwrapOk,
  unwrapErr,
  unwrapOkAsync,
  unwrapErrAsync,
  expectErrorType,
  createMockFn,
  ValidationErrorBuilder,
  formatError,
  formatResult,
} from "./testing";
