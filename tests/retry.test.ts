import { describe, expect, test, vi } from "vitest";

import { DEFAULT_RETRY_POLICY, getBackoffDelayMs, withRetry, type RetryPolicy } from "../src/http/retry.js";

describe("getBackoffDelayMs", () => {
  test("doubles from the initial delay and stops at the ceiling", () => {
    const policy = { initialDelayMs: 500, backoffMultiplier: 2, maxDelayMs: 8_000 };
    expect([1, 2, 3, 4, 5, 6].map((a) => getBackoffDelayMs(a, policy))).toEqual([500, 1000, 2000, 4000, 8000, 8000]);
  });
});

describe("withRetry", () => {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, initialDelayMs: 10, maxDelayMs: 100 };

  test("returns the first success with the attempt count", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;
    const res = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new Error(`boom ${calls}`);
        return "ok";
      },
      policy,
      { sleep }
    );
    expect(res).toEqual({ value: "ok", attempts: 3 });
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([10, 20]);
  });

  test("rethrows the last error once attempts are used up", async () => {
    const onRetry = vi.fn();
    let calls = 0;
    await expect(
      withRetry(
        async (attempt) => {
          calls += 1;
          throw new Error(`fail ${attempt}`);
        },
        { ...policy, maxAttempts: 2 },
        { sleep: async () => {}, onRetry }
      )
    ).rejects.toThrow("fail 2");
    expect(calls).toBe(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, maxAttempts: 2, delayMs: 10 });
  });

  test("does not retry errors the policy rejects", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error("permanent");
        },
        { ...policy, isRetryable: () => false },
        { sleep }
      )
    ).rejects.toThrow("permanent");
    expect(calls).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("withRetry with a non-finite attempt limit", () => {
  test("makes a single attempt", async () => {
    let calls = 0;
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxAttempts: Number.NaN };
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error("down");
        },
        policy,
        { sleep: async () => {} }
      )
    ).rejects.toThrow("down");
    expect(calls).toBe(1);
  });
});
