// src/core/utils/retry.ts
import { PipelineError } from '../errors.js';
import type { RetryPolicy } from '../types/index.js';

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Called before each wait; gets the attempt that just failed (1-based) */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  wait?: (ms: number) => Promise<void>;
}

/** Only errors flagged retryable are tried again */
export function isRetryable(error: unknown): boolean {
  if (error instanceof PipelineError) {
    return error.retryable;
  }
  return error instanceof Error && 'retryable' in error && error.retryable === true;
}

/**
 * Runs `task` up to `policy.attempts` times with exponential backoff
 * (base, 2x base, 4x base...). Rethrows the last error.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.wait ?? sleep;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) {
        throw error;
      }
      const delayMs = policy.baseDelayMs * Math.pow(2, attempt - 1);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
