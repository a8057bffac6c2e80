import { FetchError } from "../errors.js";
import { log, type Logger } from "../logger.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "./retry.js";

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export type FetchedDocument = {
  url: string;
  data: unknown;
  attempts: number;
};

export type JsonFetcher = {
  fetchJson(url: string): Promise<FetchedDocument>;
};

export type JsonFetcherOptions = {
  timeoutMs: number;
  retry?: Partial<Omit<RetryPolicy, "isRetryable">>;
  fetchImpl?: FetchImpl;
  sleep?: (delayMs: number) => Promise<void>;
  logger?: Logger;
};

/** 5xx, 429, timeouts and connection errors are worth another attempt. */
export function isTransientFetchError(error: unknown): boolean {
  if (!(error instanceof FetchError)) return false;
  if (error.kind === "network" || error.kind === "timeout") return true;
  if (error.kind === "status" && error.status !== undefined) {
    return error.status === 429 || error.status >= 500;
  }
  return false;
}

export function createJsonFetcher(opts: JsonFetcherOptions): JsonFetcher {
  const fetchImpl: FetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  const logger = opts.logger ?? log.http;
  const retry = opts.retry ?? {};
  const policy: RetryPolicy = {
    maxAttempts: retry.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    initialDelayMs: retry.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs,
    backoffMultiplier: retry.backoffMultiplier ?? DEFAULT_RETRY_POLICY.backoffMultiplier,
    maxDelayMs: retry.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    isRetryable: isTransientFetchError
  };

  const attemptOnce = async (url: string, attempt: number): Promise<unknown> => {
    let res: Response;
    try {
      res = await fetchImpl(url, {
        method: "GET",
        headers: { accept: "application/json" },
        signal: AbortSignal.timeout(opts.timeoutMs)
      });
    } catch (cause) {
      throw new FetchError(
        { url, kind: isTimeout(cause) ? "timeout" : "network", attempts: attempt, detail: messageOf(cause) },
        { cause }
      );
    }

    if (!res.ok) {
      const body = await safeReadText(res);
      throw new FetchError({ url, kind: "status", status: res.status, attempts: attempt, detail: body.slice(0, 200) });
    }

    let text: string;
    try {
      text = await res.text();
    } catch (cause) {
      throw new FetchError(
        { url, kind: isTimeout(cause) ? "timeout" : "network", attempts: attempt, detail: messageOf(cause) },
        { cause }
      );
    }

    try {
      return JSON.parse(text) as unknown;
    } catch (cause) {
      throw new FetchError({ url, kind: "invalid-body", attempts: attempt, detail: messageOf(cause) }, { cause });
    }
  };

  return {
    async fetchJson(url: string): Promise<FetchedDocument> {
      logger.debug({ url }, "GET");
      const { value, attempts } = await withRetry((attempt) => attemptOnce(url, attempt), policy, {
        sleep: opts.sleep,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          logger.warn(
            { url, attempt, maxAttempts, delayMs, reason: messageOf(error) },
            "request failed, retrying"
          );
        }
      });
      return { url, data: value, attempts };
    }
  };
}

function isTimeout(cause: unknown): boolean {
  return cause instanceof Error && (cause.name === "TimeoutError" || cause.name === "AbortError");
}

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

async function safeReadText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return "<failed to read response body>";
  }
}
