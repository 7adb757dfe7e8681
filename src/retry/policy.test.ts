import { describe, expect, it, vi } from "vitest";
import { RetryExhaustedError } from "../errors.js";
import { computeBackoffMs, resolveRetryPolicy, withRetry } from "./policy.js";

describe("retry policy", () => {
  it("caps exponential backoff", () => {
    const policy = resolveRetryPolicy({ baseDelayMs: 100, maxDelayMs: 350, jitter: false });
    expect(computeBackoffMs(policy, 1)).toBe(100);
    expect(computeBackoffMs(policy, 2)).toBe(200);
    expect(computeBackoffMs(policy, 3)).toBe(350);
  });

  it("keeps jittered delays within half to full backoff", () => {
    const policy = resolveRetryPolicy({ baseDelayMs: 100, maxDelayMs: 1000, jitter: true });
    expect(computeBackoffMs(policy, 2, () => 0)).toBe(100);
    expect(computeBackoffMs(policy, 2, () => 1)).toBe(200);
  });

  it("returns once an attempt succeeds", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");
    const result = await withRetry(fn, {
      label: "ping",
      policy: { baseDelayMs: 10, jitter: false },
      sleep,
    });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10);
  });

  it("raises RetryExhaustedError with the last cause", async () => {
    const cause = new Error("down");
    const attempt = async () => {
      throw cause;
    };
    const err = await withRetry(attempt, {
      label: "ping",
      policy: { maxAttempts: 3, baseDelayMs: 1, jitter: false },
      sleep: async () => undefined,
    }).catch((error: unknown) => error);
    expect(err).toBeInstanceOf(RetryExhaustedError);
    if (err instanceof RetryExhaustedError) {
      expect(err.attempts).toBe(3);
      expect(err.cause).toBe(cause);
      expect(err.message).toBe("ping failed after 3 attempts: down");
    }
  });

  it("rethrows non-retryable errors without sleeping", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fatal = new Error("bad request");
    await expect(
      withRetry(
        async () => {
          throw fatal;
        },
        { label: "ping", isRetryable: () => false, sleep },
      ),
    ).rejects.toBe(fatal);
    expect(sleep).not.toHaveBeenCalled();
  });
});
