/**
 * Tests for railyard/result
 */
import { describe, it, expect } from "vitest";
import { ContractViolationError, UNEXPECTED_ERROR, badRequest, notFound, type AppError } from "./errors";
import {
  UnwrapError,
  err,
  failureIf,
  from,
  fromNullable,
  fromPromise,
  isErr,
  isOk,
  ok,
  okUnit,
  successIf,
  tryAsync,
  unit,
  unwrap,
  unwrapErr,
  unwrapOr,
  unwrapOrElse,
} from "./result";

describe("constructors and guards", () => {
  it("builds the two variants", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect(err(notFound("a"))).toEqual({ ok: false, error: notFound("a") });
  });

  it("refuses a failure without an error", () => {
    const missing = undefined as unknown as AppError;
    expect(() => err(missing)).toThrow(ContractViolationError);
  });

  it("narrows with isOk and isErr", () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(ok(1))).toBe(false);
    expect(isOk(err(notFound("a")))).toBe(false);
    expect(isErr(err(notFound("a")))).toBe(true);
  });

  it("provides a unit success", () => {
    expect(okUnit()).toEqual({ ok: true, value: undefined });
    expect(okUnit()).toBe(unit);
  });
});

describe("unwrapping", () => {
  it("returns the value of a success", () => {
    expect(unwrap(ok("v"))).toBe("v");
  });

  it("throws UnwrapError carrying the error of a failure", () => {
    const error = notFound("Order 42 does not exist");
    try {
      unwrap(err(error));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UnwrapError);
      if (!(e instanceof UnwrapError)) return;
      expect(e.message).toBe("Unwrap called on a failed Result: Order 42 does not exist");
      expect(e.error).toBe(error);
    }
  });

  it("returns the error of a failure and throws for a success", () => {
    const error = badRequest("bad");
    expect(unwrapErr(err(error))).toBe(error);
    expect(() => unwrapErr(ok(1))).toThrow("unwrapErr called on a successful Result");
  });

  it("falls back with unwrapOr and unwrapOrElse", () => {
    expect(unwrapOr(ok(1), 0)).toBe(1);
    expect(unwrapOr(err(notFound("a")), 0)).toBe(0);
    expect(unwrapOrElse(err(notFound("abc")), (e) => e.message.length)).toBe(3);
  });
});

describe("from", () => {
  it("captures a return value", () => {
    expect(from(() => JSON.parse('{"a":1}'))).toEqual({ ok: true, value: { a: 1 } });
  });

  it("turns a throw into an unexpected error with the cause", () => {
    const boom = new Error("boom");
    const result = from(() => {
      throw boom;
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.type).toBe(UNEXPECTED_ERROR);
    expect(result.error.message).toBe("boom");
    expect(result.error.cause).toBe(boom);
  });

  it("maps a throw with the given mapper", () => {
    const result = from(
      () => JSON.parse("{"),
      () => badRequest("Body is not JSON")
    );
    expect(result).toEqual({ ok: false, error: badRequest("Body is not JSON") });
  });
});

describe("fromPromise and tryAsync", () => {
  it("resolves to a success", async () => {
    expect(await fromPromise(Promise.resolve(5))).toEqual({ ok: true, value: 5 });
  });

  it("captures a rejection", async () => {
    const result = await fromPromise(Promise.reject(new Error("offline")));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("offline");
  });

  it("maps a rejection", async () => {
    const result = await fromPromise(Promise.reject(new Error("gone")), () => notFound("missing"));
    expect(result).toEqual({ ok: false, error: notFound("missing") });
  });

  it("captures a synchronous throw before the promise exists", async () => {
    const result = await tryAsync(() => {
      throw new Error("not even started");
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("not even started");
  });

  it("awaits the function's promise", async () => {
    expect(await tryAsync(async () => "done")).toEqual({ ok: true, value: "done" });
  });
});

describe("conditional constructors", () => {
  it("fromNullable keeps falsy values", () => {
    const missing = () => notFound("missing");
    expect(fromNullable(0, missing)).toEqual({ ok: true, value: 0 });
    expect(fromNullable("", missing)).toEqual({ ok: true, value: "" });
    expect(fromNullable(null, missing)).toEqual({ ok: false, error: notFound("missing") });
    expect(fromNullable(undefined, missing)).toEqual({ ok: false, error: notFound("missing") });
  });

  it("successIf and failureIf pick the track from the condition", () => {
    const error = badRequest("no");
    expect(successIf(true, 1, error)).toEqual({ ok: true, value: 1 });
    expect(successIf(false, 1, error)).toEqual({ ok: false, error });
    expect(failureIf(true, 1, error)).toEqual({ ok: false, error });
    expect(failureIf(false, 1, error)).toEqual({ ok: true, value: 1 });
  });
});
