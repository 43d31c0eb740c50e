/**
 * railyard/observe
 *
 * Diagnostics side channel. Components that report what they do accept an
 * optional `onEvent` callback; the events never change a Result or the path
 * it takes.
 */

import type { AppError } from "./errors";
import type { MaybeAsyncResult, Result } from "./result";

// =============================================================================
// Events
// =============================================================================

export type ResultObservedEvent = {
  type: "result_observed";
  operation: string;
  ok: boolean;
  error?: AppError;
  ts: number;
};

export type RetryAttemptEvent = { type: "retry_attempt"; attempt: number; ts: number };

export type RetryScheduledEvent = {
  type: "retry_scheduled";
  attempt: number;
  delayMs: number;
  error: AppError;
  ts: number;
};

export type RetrySucceededEvent = { type: "retry_succeeded"; attempts: number; ts: number };

/** Every allowed attempt failed. */
export type RetryExhaustedEvent = {
  type: "retry_exhausted";
  attempts: number;
  error: AppError;
  ts: number;
};

/** `shouldRetry` declined to retry the failure. */
export type RetryStoppedEvent = {
  type: "retry_stopped";
  attempts: number;
  error: AppError;
  ts: number;
};

export type RetryCancelledEvent = { type: "retry_cancelled"; attempts: number; ts: number };

export type RailwayEvent =
  | ResultObservedEvent
  | RetryAttemptEvent
  | RetryScheduledEvent
  | RetrySucceededEvent
  | RetryExhaustedEvent
  | RetryStoppedEvent
  | RetryCancelledEvent;

export type RailwayEventHandler = (event: RailwayEvent) => void;

/**
 * Delivers an event to the handler, if there is one. A handler that throws is
 * reported on the console and otherwise ignored.
 */
export function emit(onEvent: RailwayEventHandler | undefined, event: RailwayEvent): void {
  if (!onEvent) return;
  try {
    onEvent(event);
  } catch (e) {
    console.error("railyard: onEvent handler threw an error:", e);
  }
}

// =============================================================================
// observe()
// =============================================================================

function record<T, E extends AppError>(
  result: Result<T, E>,
  operation: string,
  onEvent: RailwayEventHandler | undefined
): Result<T, E> {
  emit(onEvent, {
    type: "result_observed",
    operation,
    ok: result.ok,
    ...(result.ok ? {} : { error: result.error }),
    ts: Date.now(),
  });
  return result;
}

/**
 * Reports a Result to `onEvent` under an operation name and hands the same
 * Result back, so it can sit anywhere in a chain.
 *
 * @example
 * ```typescript
 * const order = observe(await loadOrder(id), 'loadOrder', (event) => metrics.push(event));
 * ```
 */
export function observe<T, E extends AppError>(
  result: Result<T, E>,
  operation: string,
  onEvent?: RailwayEventHandler
): Result<T, E>;
export function observe<T, E extends AppError>(
  result: Promise<Result<T, E>>,
  operation: string,
  onEvent?: RailwayEventHandler
): Promise<Result<T, E>>;
export function observe<T, E extends AppError>(
  result: MaybeAsyncResult<T, E>,
  operation: string,
  onEvent?: RailwayEventHandler
): MaybeAsyncResult<T, E> {
  if (result instanceof Promise) {
    return result.then((r) => record(r, operation, onEvent));
  }
  return record(result, operation, onEvent);
}
