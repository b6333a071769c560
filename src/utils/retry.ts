/**
 * Retry and bounded-parallelism helpers
 *
 * Exponential backoff with jitter for flaky collaborators, and an ordered
 * concurrency-limited map for per-page work.
 */

import { logger as rootLogger, Logger } from './logger';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterMs: number;
  /** Decides whether a failed attempt may be repeated */
  isRetryable: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitterMs: 250,
  isRetryable: () => true,
};

export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  const jitter = Math.random() * options.jitterMs;
  return Math.min(exponentialDelay + jitter, options.maxDelayMs);
}

/**
 * Retry an async operation with exponential backoff
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  operationName: string,
  options: Partial<RetryOptions> = {},
  logger: Logger = rootLogger
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await operation(attempt);
      if (attempt > 1) {
        logger.info({ operationName, attempt }, 'Operation succeeded after retry');
      }
      return result;
    } catch (error) {
      if (!opts.isRetryable(error) || attempt >= opts.maxAttempts) {
        throw error;
      }

      const delay = calculateDelay(attempt, opts);
      logger.warn({
        operationName,
        attempt,
        maxAttempts: opts.maxAttempts,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : error,
      }, 'Operation failed, retrying');

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

/**
 * Map items with at most `maxConcurrency` operations in flight.
 * Results keep the order of `items`, whatever order the work finishes in.
 * After the first failure no new item starts; in-flight items are awaited
 * before the first error is rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  const limit = Math.max(1, Math.min(maxConcurrency, items.length));
  let next = 0;
  let failed = false;

  const runLane = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const settled = await Promise.allSettled(Array.from({ length: limit }, () => runLane()));
  const rejection = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
  if (rejection) {
    throw rejection.reason;
  }
  return results;
}
