// ── Retry with Exponential Backoff ───────────────────────────────────

import { moduleLogger } from "../logger.js";

const log = moduleLogger("retry");

export interface RetryOptions {
  /** Max number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in ms (default: 1000), doubled on each retry */
  baseDelayMs?: number;
  /** Which HTTP status codes should trigger a retry */
  retryableStatuses?: number[];
  /** Label for logging (e.g. "LLM call") */
  label?: string;
  /** Waits between attempts. Tests pass an instant one. */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  retryableStatuses: [429, 500, 502, 503, 504],
  label: "API call",
  sleep,
};

/**
 * Wraps an async function with exponential backoff retry logic.
 * Only retries on network errors or HTTP status codes in the retryable list;
 * anything else is rethrown on the first failure.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, retryableStatuses, label, sleep } = {
    ...DEFAULT_OPTIONS,
    ...opts,
  };

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (!isRetryable(error, retryableStatuses)) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delayMs = baseDelayMs * Math.pow(2, attempt);
      log.warn(
        {
          label,
          status: getStatusCode(error),
          delayMs,
          attempt: attempt + 1,
          maxRetries,
        },
        "⚠️ Retrying API call",
      );
      await sleep(delayMs);
    }
  }

  throw lastError;
}

// ── Helpers ──────────────────────────────────────────────

export function isRetryable(
  error: unknown,
  retryableStatuses: number[],
): boolean {
  // Network errors (fetch failures, timeouts)
  if (error instanceof TypeError) return true;
  if (error instanceof Error && /ECONNRESET|ETIMEDOUT/.test(error.message)) {
    return true;
  }

  // HTTP status-based errors (the OpenAI SDK puts the status on the error)
  const status = getStatusCode(error);
  return status !== undefined && retryableStatuses.includes(status);
}

export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
