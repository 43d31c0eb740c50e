/**
 * railyard/retry
 *
 * Re-runs a Result-returning operation with exponential backoff until it
 * succeeds, runs out of attempts, is refused by `shouldRetry`, or is
 * cancelled.
 *
 * @example
 * ```typescript
 * import { retry, isServiceUnavailableError } from 'railyard';
 *
 * const order = await retry(({ signal }) => fetchOrder(id, { signal }), {
 *   maxRetries: 4,
 *   initialDelay: 200,
 *   shouldRetry: isServiceUnavailableError,
 *   signal: request.signal,
 *   onEvent: (event) => logger.debug(event),
 * });
 * ```
 */

import type { AppError } from "./errors";
import { ContractViolationError } from "./errors";
import type { RailwayEventHandler } from "./observe";
import { emit } from "./observe";
import type { AsyncResult, MaybeAsyncResult, Result } from "./result";

// =============================================================================
// Configuration
// =============================================================================

export type RetryOptions<E extends AppError = AppError> = {
  /** Retries after the first attempt. `0` runs the operation once. */
  maxRetries?: number;
  /** Wait before the first retry, in milliseconds. */
  initialDelay?: number;
  /** Factor applied to the wait after every retry. */
  backoffMultiplier?: number;
  /** Upper bound for any single wait, in milliseconds. Never above {@link MAX_RETRY_DELAY}. */
  maxDelay?: number;
  /**
   * Decides whether a failure is worth another attempt. Defaults to retrying
   * every failure.
   */
  shouldRetry?: (error: E, attempt: number) => boolean;
  signal?: AbortSignal;
  onEvent?: RailwayEventHandler;
};

export type RetryContext = {
  /** 1-based number of the current attempt. */
  attempt: number;
  signal?: AbortSignal;
};

/** Longest wait a timer can hold; Node fires longer timeouts almost at once. */
export const MAX_RETRY_DELAY = 2_147_483_647;

export const DEFAULT_RETRY_OPTIONS = Object.freeze({
  maxRetries: 3,
  initialDelay: 100,
  backoffMultiplier: 2,
  maxDelay: Number.POSITIVE_INFINITY,
});

function assertOptions(maxRetries: number, initialDelay: number, backoffMultiplier: number, maxDelay: number): void {
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new ContractViolationError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
  }
  if (!(initialDelay >= 0)) {
    throw new ContractViolationError(`initialDelay must be non-negative, got ${initialDelay}`);
  }
  if (!(backoffMultiplier >= 0)) {
    throw new ContractViolationError(`backoffMultiplier must be non-negative, got ${backoffMultiplier}`);
  }
  if (!(maxDelay >= 0)) {
    throw new ContractViolationError(`maxDelay must be non-negative, got ${maxDelay}`);
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Waits `ms` milliseconds. Resolves `false` as soon as the signal aborts and
 * `true` when the full wait elapsed.
 */
function sleep(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// =============================================================================
// retry()
// =============================================================================

/**
 * Runs `operation` up to `maxRetries + 1` times.
 *
 * - The first success is returned at once.
 * - When every attempt failed, the last failure is returned.
 * - When `shouldRetry` refuses a failure, that failure is returned without
 *   further attempts.
 * - When `signal` aborts between attempts, the most recent Result is
 *   returned. An abort before the first attempt has no Result to return, so
 *   the signal's reason is thrown.
 *
 * The wait starts at `initialDelay` and is multiplied by `backoffMultiplier`
 * after each retry, never exceeding `maxDelay` or {@link MAX_RETRY_DELAY}.
 */
export async function retry<T, E extends AppError>(
  operation: (context: RetryContext) => MaybeAsyncResult<T, E>,
  options: RetryOptions<E> = {}
): AsyncResult<T, E> {
  const {
    maxRetries = DEFAULT_RETRY_OPTIONS.maxRetries,
    initialDelay = DEFAULT_RETRY_OPTIONS.initialDelay,
    backoffMultiplier = DEFAULT_RETRY_OPTIONS.backoffMultiplier,
    maxDelay = DEFAULT_RETRY_OPTIONS.maxDelay,
    shouldRetry,
    signal,
    onEvent,
  } = options;
  assertOptions(maxRetries, initialDelay, backoffMultiplier, maxDelay);

  signal?.throwIfAborted();

  let delay = initialDelay;
  let last: Result<T, E> | undefined;

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    if (last !== undefined && signal?.aborted) {
      emit(onEvent, { type: "retry_cancelled", attempts: attempt - 1, ts: Date.now() });
      return last;
    }

    emit(onEvent, { type: "retry_attempt", attempt, ts: Date.now() });
    const result = await operation({ attempt, signal });
    last = result;

    if (result.ok) {
      emit(onEvent, { type: "retry_succeeded", attempts: attempt, ts: Date.now() });
      return result;
    }

    if (attempt > maxRetries) {
      emit(onEvent, { type: "retry_exhausted", attempts: attempt, error: result.error, ts: Date.now() });
      return result;
    }

    if (shouldRetry && !shouldRetry(result.error, attempt)) {
      emit(onEvent, { type: "retry_stopped", attempts: attempt, error: result.error, ts: Date.now() });
      return result;
    }

    const delayMs = Math.min(delay, maxDelay, MAX_RETRY_DELAY);
    emit(onEvent, { type: "retry_scheduled", attempt, delayMs, error: result.error, ts: Date.now() });
    const completed = await sleep(delayMs, signal);
    if (!completed) {
      emit(onEvent, { type: "retry_cancelled", attempts: attempt, ts: Date.now() });
      return result;
    }
    delay = Math.min(delay * backoffMultiplier, maxDelay);
  }

  // The loop always returns on its last attempt.
  throw new ContractViolationError("retry finished without a result");
}
