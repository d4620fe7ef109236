import { describe, it, expect, vi } from "vitest";
import { backoffDelay, withRetry } from "@/lib/utils/retry";
import { getHttpStatus, getProviderCode, isTransientError } from "@/lib/utils/error";

describe("backoffDelay", () => {
  it("doubles per attempt", () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(500, attempt))).toEqual([500, 1000, 2000, 4000]);
  });
});

describe("withRetry", () => {
  it("returns the first success and sleeps between attempts", async () => {
    const sleeps: number[] = [];
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("one"))
      .mockRejectedValueOnce(new Error("two"))
      .mockResolvedValueOnce("ok");

    const result = await withRetry(fn, {
      attempts: 3,
      baseDelayMs: 100,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    expect(result).toBe("ok");
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleeps).toEqual([100, 200]);
  });

  it("rethrows the last error when attempts run out", async () => {
    let calls = 0;
    const fn = async () => {
      calls += 1;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(fn, { attempts: 2, baseDelayMs: 1, sleep: async () => undefined })).rejects.toThrow(
      "failure 2"
    );
  });

  it("stops at once when the error is not retryable", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn(async () => {
      throw new Error("bad request");
    });

    await expect(
      withRetry(fn, { attempts: 5, baseDelayMs: 1, shouldRetry: () => false, onRetry, sleep: async () => undefined })
    ).rejects.toThrow("bad request");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });
});

describe("error classification", () => {
  it("reads the status from Gaxios and OpenAI errors", () => {
    expect(getHttpStatus({ response: { status: 503 } })).toBe(503);
    expect(getHttpStatus({ status: 429 })).toBe(429);
    expect(getHttpStatus(new Error("plain"))).toBeUndefined();
  });

  it("prefers the Google error status over a numeric code", () => {
    expect(getProviderCode({ code: 429, response: { data: { error: { status: "RESOURCE_EXHAUSTED" } } } })).toBe(
      "RESOURCE_EXHAUSTED"
    );
    expect(getProviderCode({ code: 404 })).toBe("404");
  });

  it.each([
    [{ response: { status: 429 } }, true],
    [{ response: { status: 503 } }, true],
    [{ response: { status: 403 } }, false],
    [{ status: 400 }, false],
    [Object.assign(new Error("getaddrinfo"), { code: "EAI_AGAIN" }), true],
    [new Error("socket hang up"), true],
    [new Error("invalid_grant"), false],
  ])("classifies %o as transient=%s", (error, expected) => {
    expect(isTransientError(error)).toBe(expected);
  });
});
