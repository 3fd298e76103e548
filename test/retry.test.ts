import { describe, expect, it, vi } from "vitest";
import { ApiCallError, classifyApiError, isRetryableKind, UnitTimeoutError } from "../src/lib/errors";
import { callWithRetry, exponentialDelays, retryAsync } from "../src/lib/retry";
import { grpcError } from "./utils/fakes";

describe("retryAsync", () => {
  it("retries until the call succeeds", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(grpcError(14, "unavailable"))
      .mockRejectedValueOnce(grpcError(8, "quota exhausted"))
      .mockResolvedValueOnce("ok");

    const result = await retryAsync(fn, {
      retries: 3,
      delaysMs: [0, 0, 0],
      shouldRetry: () => true,
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("reports each retry with its delay", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(new Error("boom")).mockResolvedValueOnce(1);

    await retryAsync(fn, { retries: 2, delaysMs: [0], shouldRetry: () => true, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toMatchObject({ attempt: 1, delayMs: 0 });
  });
});

describe("exponentialDelays", () => {
  it("uses backoffFactor ** n seconds for retry n", () => {
    expect(exponentialDelays(3, 2)).toEqual([2000, 4000, 8000]);
    expect(exponentialDelays(0, 2)).toEqual([]);
  });
});

describe("callWithRetry", () => {
  it("does not retry authentication failures", async () => {
    const fn = vi.fn().mockRejectedValue(grpcError(16, "UNAUTHENTICATED: bad key"));

    const error = await callWithRetry(fn, { maxRetries: 3, backoffFactor: 2, delaysMs: [0] }).catch(
      (err: unknown) => err
    );

    expect(fn).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(ApiCallError);
    if (error instanceof ApiCallError) {
      expect(error.kind).toBe("auth");
      expect(error.attempts).toBe(1);
    }
  });

  it("uses every attempt on transient failures and tags the last one", async () => {
    const fn = vi.fn().mockRejectedValue(grpcError(14, "UNAVAILABLE"));

    const error = await callWithRetry(fn, { maxRetries: 2, backoffFactor: 2, delaysMs: [0] }).catch(
      (err: unknown) => err
    );

    expect(fn).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(ApiCallError);
    if (error instanceof ApiCallError) {
      expect(error.kind).toBe("transient");
      expect(error.attempts).toBe(3);
      expect(error.message).toBe("[transient] code 14 UNAVAILABLE (after 3 attempts)");
    }
  });
});

describe("callWithRetry cancellation", () => {
  it("stops during the backoff sleep once the signal aborts", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(grpcError(14, "UNAVAILABLE"));
    setTimeout(() => controller.abort(new UnitTimeoutError(10)), 10);

    const error = await callWithRetry(
      fn,
      { maxRetries: 3, backoffFactor: 2, delaysMs: [5_000] },
      undefined,
      controller.signal
    ).catch((err: unknown) => err);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(ApiCallError);
    if (error instanceof ApiCallError) {
      expect(error.kind).toBe("timeout");
      expect(error.message).toBe("[timeout] Timed out after 10ms (after 1 attempt)");
    }
  });

  it("makes no call when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new UnitTimeoutError(5));
    const fn = vi.fn().mockResolvedValue("ok");

    const error = await callWithRetry(fn, { maxRetries: 3, backoffFactor: 2 }, undefined, controller.signal).catch(
      (err: unknown) => err
    );

    expect(fn).not.toHaveBeenCalled();
    expect(error instanceof ApiCallError && error.kind).toBe("timeout");
  });
});

describe("classifyApiError", () => {
  it("maps gRPC codes, HTTP statuses and messages to kinds", () => {
    expect(classifyApiError(grpcError(7, "denied"))).toBe("auth");
    expect(classifyApiError(grpcError(3, "bad dimension"))).toBe("invalid_request");
    expect(classifyApiError(grpcError(8, "exhausted"))).toBe("quota");
    expect(classifyApiError({ status: 503, message: "x" })).toBe("transient");
    expect(classifyApiError({ status: 404 })).toBe("not_found");
    expect(classifyApiError(new Error("read ECONNRESET"))).toBe("transient");
    expect(classifyApiError(new UnitTimeoutError(10))).toBe("timeout");
    expect(classifyApiError(new Error("something odd"))).toBe("unknown");
  });

  it("treats only auth, invalid request and not found as final", () => {
    expect(isRetryableKind("auth")).toBe(false);
    expect(isRetryableKind("invalid_request")).toBe(false);
    expect(isRetryableKind("not_found")).toBe(false);
    expect(isRetryableKind("quota")).toBe(true);
    expect(isRetryableKind("unknown")).toBe(true);
  });
});
