/**
 * Bounded retry helpers for calls into external capabilities.
 */

import { Err, Ok, type Result } from "./result.js";

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Fixed delay between attempts */
  delayMs?: number;
  onRetry?: (attempt: number, error: Error) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with a fixed delay.
 *
 * @throws The last error once every attempt has failed
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const result = await withRetryResult(fn, options);
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

/**
 * Retry a function and return a Result instead of throwing, so the caller
 * decides how to translate the final failure.
 */
export async function withRetryResult<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<Result<T, Error>> {
  const { delayMs = 0, onRetry } = options;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: Error = new Error("No attempts were made");

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return Ok(await fn());
    } catch (error) {
      lastError = toError(error);

      if (attempt < maxAttempts) {
        onRetry?.(attempt, lastError);
        if (delayMs > 0) {
          await sleep(delayMs);
        }
      }
    }
  }

  return Err(lastError);
}
