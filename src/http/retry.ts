export type RetryPolicy = {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 8_000,
  isRetryable: () => true
};

export type RetryNotice = { attempt: number; maxAttempts: number; delayMs: number; error: unknown };

export type RetryOptions = {
  sleep?: (delayMs: number) => Promise<void>;
  onRetry?: (notice: RetryNotice) => void;
};

export type RetryOutcome<T> = { value: T; attempts: number };

/** Delay after the given failed attempt (1-based). */
export function getBackoffDelayMs(attempt: number, policy: Pick<RetryPolicy, "initialDelayMs" | "backoffMultiplier" | "maxDelayMs">): number {
  const rawDelay = policy.initialDelayMs * policy.backoffMultiplier ** Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(0, Math.round(rawDelay)));
}

export function sleep(delayMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, delayMs));
}

/**
 * Runs `fn` until it resolves, the error is not retryable, or the policy's
 * attempts are used up. The last error is rethrown as-is; `fn` receives the
 * current attempt so it can stamp it on the error it throws.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const wait = opts.sleep ?? sleep;
  const maxAttempts = Number.isFinite(policy.maxAttempts) ? Math.max(1, Math.floor(policy.maxAttempts)) : 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      if (attempt >= maxAttempts || !policy.isRetryable(error)) throw error;
      const delayMs = getBackoffDelayMs(attempt, policy);
      opts.onRetry?.({ attempt, maxAttempts, delayMs, error });
      await wait(delayMs);
    }
  }
}
