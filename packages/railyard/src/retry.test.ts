/**
 * Tests for railyard/retry
 */
import { afterEach, describe, it, expect, vi } from "vitest";
import { ContractViolationError, isServiceUnavailableError, notFound, serviceUnavailable } from "./errors";
import type { RailwayEvent } from "./observe";
import { err, ok, type Result } from "./result";
import { DEFAULT_RETRY_OPTIONS, MAX_RETRY_DELAY, retry, type RetryContext } from "./retry";

const alwaysFails = vi.fn(
  ({ attempt }: RetryContext): Result<string> => err(serviceUnavailable(`attempt ${attempt}`))
);

afterEach(() => {
  alwaysFails.mockClear();
  vi.useRealTimers();
});

describe("retry", () => {
  it("uses documented defaults", () => {
    expect(DEFAULT_RETRY_OPTIONS).toEqual({
      maxRetries: 3,
      initialDelay: 100,
      backoffMultiplier: 2,
      maxDelay: Number.POSITIVE_INFINITY,
    });
    expect(Object.isFrozen(DEFAULT_RETRY_OPTIONS)).toBe(true);
  });

  it("returns the first success without retrying", async () => {
    const operation = vi.fn(() => ok("done"));
    expect(await retry(operation)).toEqual(ok("done"));
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("runs maxRetries + 1 attempts and returns the last failure", async () => {
    const result = await retry(alwaysFails, { maxRetries: 2, initialDelay: 0 });

    expect(alwaysFails).toHaveBeenCalledTimes(3);
    expect(result).toEqual(err(serviceUnavailable("attempt 3")));
  });

  it("runs once with maxRetries 0", async () => {
    await retry(alwaysFails, { maxRetries: 0 });
    expect(alwaysFails).toHaveBeenCalledTimes(1);
  });

  it("stops when shouldRetry refuses the failure", async () => {
    const events: RailwayEvent[] = [];
    const result = await retry(alwaysFails, {
      shouldRetry: () => false,
      onEvent: (event) => events.push(event),
    });

    expect(alwaysFails).toHaveBeenCalledTimes(1);
    expect(result).toEqual(err(serviceUnavailable("attempt 1")));
    expect(events.map((e) => e.type)).toEqual(["retry_attempt", "retry_stopped"]);
  });

  it("passes the error and attempt number to shouldRetry", async () => {
    const operation = vi.fn(({ attempt }: RetryContext): Result<string> =>
      attempt === 1 ? err(serviceUnavailable("busy")) : err(notFound("gone"))
    );
    const shouldRetry = vi.fn(isServiceUnavailableError);

    const result = await retry(operation, { shouldRetry, initialDelay: 0 });

    expect(operation).toHaveBeenCalledTimes(2);
    expect(shouldRetry).toHaveBeenNthCalledWith(1, serviceUnavailable("busy"), 1);
    expect(shouldRetry).toHaveBeenNthCalledWith(2, notFound("gone"), 2);
    expect(result).toEqual(err(notFound("gone")));
  });

  it("succeeds after transient failures", async () => {
    const operation = vi.fn(({ attempt }: RetryContext): Result<number> =>
      attempt < 3 ? err(serviceUnavailable("busy")) : ok(attempt)
    );
    const events: RailwayEvent[] = [];

    const result = await retry(operation, { initialDelay: 0, onEvent: (e) => events.push(e) });

    expect(result).toEqual(ok(3));
    expect(events.map((e) => e.type)).toEqual([
      "retry_attempt",
      "retry_scheduled",
      "retry_attempt",
      "retry_scheduled",
      "retry_attempt",
      "retry_succeeded",
    ]);
  });

  it("reports exhaustion", async () => {
    const events: RailwayEvent[] = [];
    await retry(alwaysFails, { maxRetries: 1, initialDelay: 0, onEvent: (e) => events.push(e) });

    expect(events.map((e) => e.type)).toEqual([
      "retry_attempt",
      "retry_scheduled",
      "retry_attempt",
      "retry_exhausted",
    ]);
    expect(events[3]).toMatchObject({ type: "retry_exhausted", attempts: 2 });
  });

  it("backs off exponentially", async () => {
    vi.useFakeTimers();
    const delays: number[] = [];

    const pending = retry(alwaysFails, {
      onEvent: (e) => {
        if (e.type === "retry_scheduled") delays.push(e.delayMs);
      },
    });
    await vi.runAllTimersAsync();
    await pending;

    expect(delays).toEqual([100, 200, 400]);
    expect(alwaysFails).toHaveBeenCalledTimes(4);
  });

  it("caps the delay at maxDelay", async () => {
    vi.useFakeTimers();
    const delays: number[] = [];

    const pending = retry(alwaysFails, {
      maxRetries: 4,
      initialDelay: 100,
      backoffMultiplier: 3,
      maxDelay: 500,
      onEvent: (e) => {
        if (e.type === "retry_scheduled") delays.push(e.delayMs);
      },
    });
    await vi.runAllTimersAsync();
    await pending;

    expect(delays).toEqual([100, 300, 500, 500]);
  });

  it("never waits longer than a timer can hold", async () => {
    vi.useFakeTimers();
    const delays: number[] = [];

    const pending = retry(alwaysFails, {
      maxRetries: 1,
      initialDelay: 3_000_000_000,
      onEvent: (e) => {
        if (e.type === "retry_scheduled") delays.push(e.delayMs);
      },
    });

    await vi.advanceTimersByTimeAsync(10);
    expect(alwaysFails).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([MAX_RETRY_DELAY]);

    await vi.advanceTimersByTimeAsync(MAX_RETRY_DELAY - 10);
    expect(await pending).toEqual(err(serviceUnavailable("attempt 2")));
    expect(alwaysFails).toHaveBeenCalledTimes(2);
  });

  it("waits before retrying", async () => {
    vi.useFakeTimers();
    const pending = retry(alwaysFails, { maxRetries: 1, initialDelay: 1000 });

    await vi.advanceTimersByTimeAsync(999);
    expect(alwaysFails).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(await pending).toEqual(err(serviceUnavailable("attempt 2")));
    expect(alwaysFails).toHaveBeenCalledTimes(2);
  });

  it("returns the latest Result when cancelled during a wait", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const events: RailwayEvent[] = [];

    const pending = retry(alwaysFails, {
      initialDelay: 1000,
      signal: controller.signal,
      onEvent: (e) => events.push(e),
    });
    await vi.advanceTimersByTimeAsync(500);
    controller.abort();

    expect(await pending).toEqual(err(serviceUnavailable("attempt 1")));
    expect(alwaysFails).toHaveBeenCalledTimes(1);
    expect(events.at(-1)).toMatchObject({ type: "retry_cancelled", attempts: 1 });
  });

  it("throws the abort reason when cancelled before the first attempt", async () => {
    const controller = new AbortController();
    controller.abort(new Error("shutting down"));

    await expect(retry(alwaysFails, { signal: controller.signal })).rejects.toThrow("shutting down");
    expect(alwaysFails).not.toHaveBeenCalled();
  });

  it("passes the attempt number and signal to the operation", async () => {
    const controller = new AbortController();
    const contexts: RetryContext[] = [];

    await retry(
      (context) => {
        contexts.push(context);
        return err(serviceUnavailable("busy"));
      },
      { maxRetries: 1, initialDelay: 0, signal: controller.signal }
    );

    expect(contexts).toEqual([
      { attempt: 1, signal: controller.signal },
      { attempt: 2, signal: controller.signal },
    ]);
  });

  it("accepts async operations", async () => {
    const result = await retry(async ({ attempt }) => (attempt === 1 ? err(serviceUnavailable("busy")) : ok("ok")), {
      initialDelay: 0,
    });
    expect(result).toEqual(ok("ok"));
  });

  it("rejects invalid options", async () => {
    await expect(retry(alwaysFails, { maxRetries: -1 })).rejects.toThrow(ContractViolationError);
    await expect(retry(alwaysFails, { maxRetries: 1.5 })).rejects.toThrow(ContractViolationError);
    await expect(retry(alwaysFails, { initialDelay: -10 })).rejects.toThrow(ContractViolationError);
    expect(alwaysFails).not.toHaveBeenCalled();
  });

  it("keeps going when the event handler throws", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const result = await retry(() => ok(1), {
      onEvent: () => {
        throw new Error("listener broke");
      },
    });

    expect(result).toEqual(ok(1));
    expect(consoleError).toHaveBeenCalledWith("railyard: onEvent handler threw an error:", new Error("listener broke"));
    consoleError.mockRestore();
  });
});
