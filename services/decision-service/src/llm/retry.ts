import type { RetryConfig } from "../config";
import { RetryExhaustedError } from "../errors";
import { logger } from "../logger";

export type RetryableFailure = "rate_limit" | "timeout";

export type RetryOptions = RetryConfig & {
  operation: string;
  sleep?: (ms: number) => Promise<void>;
};

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT"]);

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Classifies an error thrown by an LLM call. Only rate limits and timeouts
 * are worth another attempt; everything else returns null.
 */
export function classifyFailure(error: unknown): RetryableFailure | null {
  if (typeof error !== "object" || error === null) {
    return null;
  }
  const status = readField(error, "status") ?? readField(error, "statusCode");
  const code = readField(error, "code");
  const name = readField(error, "name");
  const message = readField(error, "message");

  if (status === 429 || code === "rate_limit_exceeded") {
    return "rate_limit";
  }
  if (typeof message === "string" && message.toLowerCase().includes("rate limit")) {
    return "rate_limit";
  }
  if (status === 408 || status === 504 || name === "APIConnectionTimeoutError") {
    return "timeout";
  }
  if (typeof code === "string" && TIMEOUT_CODES.has(code)) {
    return "timeout";
  }
  return null;
}

export function backoffDelay(attempt: number, options: RetryConfig): number {
  const delay = options.initialBackoffMs * options.backoffMultiplier ** (attempt - 1);
  return Math.min(delay, options.maxBackoffMs);
}

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const failure = classifyFailure(error);
      if (!failure) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(options.operation, attempt, error);
      }
      const backoff = backoffDelay(attempt, options);
      logger.warn(
        { operation: options.operation, failure, attempt, backoff },
        `LLM call hit ${failure}, retrying in ${backoff}ms`
      );
      await wait(backoff);
    }
  }
}
