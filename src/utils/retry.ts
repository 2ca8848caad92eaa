import { logger } from './logger';
import { metrics } from '../metrics/metrics';
import { isStorageUnavailable } from './errors';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  /** Which failures are worth another attempt */
  retryable?: (error: unknown) => boolean;
  /** Context merged into the retry log lines */
  context?: Record<string, unknown>;
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `fn`, retrying retryable failures with exponential backoff
 * (baseDelayMs, 2×, 4×, …). The last failure is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const retryable = options.retryable ?? isStorageUnavailable;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!retryable(err) || attempt >= options.attempts) {
        throw err;
      }

      const delayMs = options.baseDelayMs * 2 ** attempt;
      metrics.storageRetriesTotal.inc();
      logger.warn(
        { ...options.context, error: err, attempt: attempt + 1, delayMs },
        'Storage unavailable, retrying'
      );
      await sleep(delayMs);
    }
  }
}
