/**
 * Tests for railyard/observe
 */
import { describe, it, expect, vi } from "vitest";
import { notFound } from "./errors";
import { emit, observe, type RailwayEvent } from "./observe";
import { err, ok } from "./result";

describe("observe", () => {
  it("reports a success and returns the same Result", () => {
    const events: RailwayEvent[] = [];
    const result = ok(1);

    expect(observe(result, "load", (e) => events.push(e))).toBe(result);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "result_observed", operation: "load", ok: true });
    expect("error" in events[0]).toBe(false);
  });

  it("reports the error of a failure", () => {
    const events: RailwayEvent[] = [];
    const error = notFound("missing");

    observe(err(error), "load", (e) => events.push(e));

    expect(events[0]).toMatchObject({ type: "result_observed", operation: "load", ok: false, error });
  });

  it("observes a promised Result once it settles", async () => {
    const events: RailwayEvent[] = [];
    const result = ok("v");

    const observed = observe(Promise.resolve(result), "fetch", (e) => events.push(e));
    expect(events).toHaveLength(0);

    expect(await observed).toBe(result);
    expect(events).toHaveLength(1);
  });

  it("is a no-op without a handler", () => {
    const result = err(notFound("a"));
    expect(observe(result, "load")).toBe(result);
  });

  it("stamps events with the current time", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
    const events: RailwayEvent[] = [];

    observe(ok(1), "load", (e) => events.push(e));

    expect(events[0].ts).toBe(Date.UTC(2024, 0, 1));
    vi.useRealTimers();
  });
});

describe("emit", () => {
  it("reports a throwing handler on the console and carries on", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const failure = new Error("handler broke");

    const result = ok(1);
    expect(
      observe(result, "load", () => {
        throw failure;
      })
    ).toBe(result);

    expect(consoleError).toHaveBeenCalledWith("railyard: onEvent handler threw an error:", failure);
    consoleError.mockRestore();
  });

  it("does nothing without a handler", () => {
    expect(() => emit(undefined, { type: "retry_attempt", attempt: 1, ts: 0 })).not.toThrow();
  });
});
