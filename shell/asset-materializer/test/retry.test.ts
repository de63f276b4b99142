import { describe, it, expect, vi } from "vitest";
import { createMockLogger } from "@slidesmith/test-utils";
import { RetryHandler, TransientIOError, isTransientError } from "../src";

describe("RetryHandler", () => {
  const policy = { attempts: 3, delayMs: 1 };

  it("should return the first successful result", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientIOError("busy"))
      .mockResolvedValue("done");

    const result = await new RetryHandler().retry(fn, {
      operation: "Generating",
      policy,
      isRetryable: isTransientError,
    });

    expect(result).toBe("done");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should wait longer after each failed attempt", async () => {
    const logger = createMockLogger();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TransientIOError("busy"));

    await expect(
      new RetryHandler(logger).retry(fn, {
        operation: "Generating A.png",
        policy: { attempts: 3, delayMs: 5 },
        isRetryable: isTransientError,
      }),
    ).rejects.toThrow("busy");

    expect(fn).toHaveBeenCalledTimes(3);
    expect(vi.mocked(logger.warn).mock.calls).toEqual([
      ["Generating A.png attempt 1/3 failed, retrying in 5ms: busy"],
      ["Generating A.png attempt 2/3 failed, retrying in 10ms: busy"],
    ]);
  });

  it("should fail at once on a non-retryable error", async () => {
    const permanent = new Error("bad request");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(permanent);

    await expect(
      new RetryHandler().retry(fn, {
        operation: "Generating",
        policy,
        isRetryable: isTransientError,
      }),
    ).rejects.toBe(permanent);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should make a single attempt when attempts is 1", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TransientIOError("busy"));

    await expect(
      new RetryHandler().retry(fn, {
        operation: "Generating",
        policy: { attempts: 1, delayMs: 0 },
        isRetryable: isTransientError,
      }),
    ).rejects.toThrow("busy");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("isTransientError", () => {
  it("should accept TransientIOError", () => {
    expect(isTransientError(new TransientIOError("x"))).toBe(true);
  });

  it("should accept network error codes, also as a cause", () => {
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    expect(isTransientError(reset)).toBe(true);
    expect(isTransientError(new TypeError("fetch failed", { cause: reset }))).toBe(true);
  });

  it("should reject other errors", () => {
    expect(isTransientError(new Error("invalid prompt"))).toBe(false);
    expect(isTransientError(Object.assign(new Error("gone"), { code: "ENOENT" }))).toBe(false);
    expect(isTransientError("busy")).toBe(false);
  });
});
