import { describeError } from '../errors';
import { logger } from './logger';
import { sleep } from './sleep';

export interface RetryPolicy {
  /** Attempts after the first one */
  maxRetries: number;
  /** Delay before the first retry, doubled for each one after */
  baseDelayMs: number;
  /** Upper bound on any single delay */
  maxDelayMs: number;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
}

/**
 * Run `operation`, retrying while `isRetryable` accepts the error and
 * attempts remain. The last error is rethrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  isRetryable: (error: unknown) => boolean,
  label = 'operation'
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.maxRetries || !isRetryable(error)) {
        throw error;
      }

      const delay = backoffDelay(policy, attempt);
      logger.warn(
        `${label} failed (attempt ${attempt + 1}/${policy.maxRetries + 1}), retrying in ${delay}ms: ${describeError(error)}`
      );
      await sleep(delay);
    }
  }
}
