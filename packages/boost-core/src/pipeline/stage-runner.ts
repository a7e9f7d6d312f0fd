/**
 * FILE PURPOSE: Per-stage timeout and bounded retry with exponential backoff
 *
 * WHY: A hung store or send must surface as a retryable stage failure, not
 *      hold a worker slot forever. Queue-backed stages get their retries from
 *      BullMQ; the in-process chain uses retryStage for the same schedule.
 */

import { StageTimeoutError, isRetryable } from '../errors.js';
import type { StageRetryOptions } from './queue.js';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `work`, rejecting with StageTimeoutError once `timeoutMs` elapses.
 * The underlying work is not cancelled; its late result is discarded.
 * A non-positive timeout disables the limit.
 */
export async function withStageTimeout<T>(
  stage: string,
  timeoutMs: number,
  work: () => Promise<T> | T,
): Promise<T> {
  if (timeoutMs <= 0) return work();

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StageTimeoutError(stage, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([Promise.resolve().then(work), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Delay before retry number `retry` (1-based): backoffMs · 2^(retry-1). */
export function backoffDelay(retry: number, backoffMs: number): number {
  return backoffMs * 2 ** (retry - 1);
}

/**
 * Run `work` up to `attempts` times. Non-retryable errors are rethrown
 * immediately; the last retryable error is rethrown once attempts run out.
 */
export async function retryStage<T>(
  work: () => Promise<T>,
  retry: StageRetryOptions,
  sleep: Sleep = defaultSleep,
  onRetry?: (attempt: number, err: unknown) => void,
): Promise<T> {
  const attempts = Math.max(1, retry.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await work();
    } catch (err) {
      if (attempt >= attempts || !isRetryable(err)) throw err;
      onRetry?.(attempt, err);
      await sleep(backoffDelay(attempt, retry.backoffMs));
    }
  }
}
