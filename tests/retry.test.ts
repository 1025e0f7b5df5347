import { describe, it, expect, vi } from "vitest";
import { getStatusCode, isRetryable, withRetry } from "../src/llm/retry.js";

function httpError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe("withRetry", () => {
  it("returns the first success without waiting", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async () => "ok");

    await expect(withRetry(fn, { sleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries retryable failures with doubling delays", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, { sleep, baseDelayMs: 100 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("gives up after maxRetries and rethrows the last error", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async () => {
      throw httpError(502);
    });

    await expect(withRetry(fn, { sleep, maxRetries: 2 })).rejects.toThrow("HTTP 502");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("does not retry a client error", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async () => {
      throw httpError(400);
    });

    await expect(withRetry(fn, { sleep })).rejects.toThrow("HTTP 400");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("isRetryable", () => {
  const statuses = [429, 500, 502, 503, 504];

  it("retries network failures", () => {
    expect(isRetryable(new TypeError("fetch failed"), statuses)).toBe(true);
    expect(isRetryable(new Error("read ECONNRESET"), statuses)).toBe(true);
    expect(isRetryable(new Error("connect ETIMEDOUT"), statuses)).toBe(true);
  });

  it("retries only listed statuses", () => {
    expect(isRetryable(httpError(500), statuses)).toBe(true);
    expect(isRetryable(httpError(401), statuses)).toBe(false);
    expect(isRetryable(new Error("plain"), statuses)).toBe(false);
  });
});

describe("getStatusCode", () => {
  it("reads status or statusCode", () => {
    expect(getStatusCode({ status: 429 })).toBe(429);
    expect(getStatusCode({ statusCode: 503 })).toBe(503);
    expect(getStatusCode({ status: "429" })).toBeUndefined();
    expect(getStatusCode("boom")).toBeUndefined();
    expect(getStatusCode(null)).toBeUndefined();
  });
});
