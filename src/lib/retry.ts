// Retry with exponential backoff.
// The delay schedule is a pure function of the attempt number so it can be tested without a clock.

import { errorMessage, isRateLimitError, isRetryableError, RetryExhaustedError } from './errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  jitter: number;  // fraction in [0, 1); 0 disables jitter
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  jitter: 0,
};

/**
 * Delay before the attempt that follows `attempt` (1-based).
 * Rate-limit failures wait twice as long. `random` in [0, 1) scales the jitter.
 */
export function delayForAttempt(
  policy: RetryPolicy,
  attempt: number,
  options: { rateLimited?: boolean; random?: number } = {}
): number {
  const { rateLimited = false, random = 0 } = options;
  let delay = policy.baseDelayMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
  if (rateLimited) delay *= 2;
  return delay * (1 + policy.jitter * random);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  sleep?: Sleep;
  random?: () => number;
  logPrefix?: string;
}

export async function withRetry<T>(
  label: string,
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const { sleep: wait = sleep, random = Math.random, logPrefix = '[Retry]' } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (!isRetryableError(err)) throw err;

      if (attempt === policy.maxAttempts) {
        console.error(`${logPrefix} ${label} failed after ${attempt} attempts: ${errorMessage(err)}`);
        break;
      }
      const rateLimited = isRateLimitError(err);
      const delay = delayForAttempt(policy, attempt, {
        rateLimited,
        random: policy.jitter > 0 ? random() : 0,
      });
      console.warn(
        `${logPrefix} ${label} attempt ${attempt}/${policy.maxAttempts} failed (${errorMessage(err)})` +
        `${rateLimited ? ' [rate limited]' : ''}, retrying in ${Math.round(delay)}ms...`
      );
      await wait(delay);
    }
  }

  throw new RetryExhaustedError(label, policy.maxAttempts, lastError);
}
