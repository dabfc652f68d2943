import type { AdapterResult } from '../types/index.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total attempts, including the first. */
  attempts: number;
  baseDelayMs: number;
  sleep?: Sleep;
  /** Called before each wait with the attempt that just failed. */
  onRetry?: (attempt: number, error: string, delayMs: number) => void;
}

/** Delay before the attempt after `attempt`: base * 2^(attempt-1). */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Run an adapter call until it succeeds, fails fatally, or runs out of attempts.
 * The last failure is returned unchanged.
 */
export async function withRetry<T>(
  call: (attempt: number) => Promise<AdapterResult<T>>,
  options: RetryOptions
): Promise<AdapterResult<T>> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, options.attempts);

  let result = await call(1);
  for (let attempt = 1; attempt < attempts; attempt++) {
    if (result.ok || !result.retryable) {
      return result;
    }
    const delayMs = backoffDelay(options.baseDelayMs, attempt);
    options.onRetry?.(attempt, result.error, delayMs);
    await wait(delayMs);
    result = await call(attempt + 1);
  }
  return result;
}
