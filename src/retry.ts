// Labor Law Assistant - Retry with exponential backoff
// Used around outbound LLM calls. Every error is treated as transient.

import { GenerationError } from "./errors.js";
import { sleep } from "./utils.js";

export interface RetryOptions {
  /** Total attempts, including the first. */
  attempts?: number;
  /** Backoff multiplier, in seconds. */
  multiplierSeconds?: number;
  minDelaySeconds?: number;
  maxDelaySeconds?: number;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export const DEFAULT_RETRY_ATTEMPTS = 3;

/**
 * Delay before retry number `attempt` (1-based):
 * min(max, max(min, multiplier * 2^(attempt-1))) seconds.
 */
export function backoffDelayMs(
  attempt: number,
  multiplierSeconds: number = 2,
  minDelaySeconds: number = 2,
  maxDelaySeconds: number = 60,
): number {
  const exponential = multiplierSeconds * 2 ** (attempt - 1);
  const seconds = Math.min(maxDelaySeconds, Math.max(minDelaySeconds, exponential));
  return seconds * 1000;
}

/**
 * Runs `fn` until it resolves or the attempt budget is spent. With the
 * defaults that is three attempts with 2s then 4s between them. Exhaustion
 * throws a GenerationError carrying the last failure.
 */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_RETRY_ATTEMPTS);
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === attempts) break;
      const delayMs = backoffDelayMs(
        attempt,
        options.multiplierSeconds,
        options.minDelaySeconds,
        options.maxDelaySeconds,
      );
      options.onRetry?.(attempt, err, delayMs);
      await wait(delayMs);
    }
  }

  throw new GenerationError(attempts, lastError);
}
