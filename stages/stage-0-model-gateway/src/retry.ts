import type { RetryOptions } from "./types.js";
import { ProviderError } from "./providers/types.js";

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 2,
  backoffMs: 300,
  maxBackoffMs: 2000,
  jitter: 0.2,
};

const RETRYABLE_CODES = ["ETIMEDOUT", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN"];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function withJitter(value: number, jitter: number): number {
  const delta = value * jitter;
  return value + (Math.random() * 2 - 1) * delta;
}

function readField(error: object, field: "name" | "code"): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

export function isRetryableError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }

  if (error instanceof ProviderError) {
    const status = error.status ?? 0;
    return status === 429 || status >= 500;
  }

  // gateway 的超时通过 abort 实现，也算可重试
  if (readField(error, "name") === "AbortError") {
    return true;
  }

  const code = readField(error, "code");
  return code !== undefined && RETRYABLE_CODES.includes(code);
}

export function backoffDelay(attempt: number, retry: RetryOptions): number {
  const rawBackoff = retry.backoffMs * Math.pow(2, attempt - 1);
  const cappedBackoff = Math.min(rawBackoff, retry.maxBackoffMs ?? rawBackoff);
  const delay = retry.jitter
    ? withJitter(cappedBackoff, retry.jitter)
    : cappedBackoff;
  return Math.max(0, delay);
}

/**
 * Retry `fn` with exponential backoff. A caller abort (`abortSignal`) is never
 * retried; timeouts and transient provider failures are.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>,
  abortSignal?: AbortSignal
): Promise<T> {
  const retry: RetryOptions = { ...DEFAULT_RETRY, ...(options ?? {}) };
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;
      if (
        abortSignal?.aborted ||
        attempt > retry.maxRetries ||
        !isRetryableError(error)
      ) {
        throw error;
      }
      await sleep(backoffDelay(attempt, retry));
    }
  }
}
