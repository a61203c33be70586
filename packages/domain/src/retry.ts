import { setTimeout as sleep } from 'node:timers/promises';
import { isRetryable } from './errors.js';

/**
 * Bounded exponential backoff, applied at every boundary that talks to an
 * external service (publish, ASR, sink).
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;

  /** Delay before the first retry */
  baseDelayMs: number;

  /** Upper bound for any single delay */
  maxDelayMs: number;

  /** Spread delays by +/-25% (default: true) */
  jitter?: boolean;
}

export interface RetryOptions {
  /** Decides whether a failure is worth another attempt (default: taxonomy classification) */
  isRetryable?: (error: unknown) => boolean;

  /** Called before sleeping ahead of the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  sleep?: (ms: number) => Promise<void>;
}

/**
 * Calculate exponential backoff delay with jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelayMs: number = 1000,
  maxDelayMs: number = 300000, // 5 minutes max
  jitter: boolean = true
): number {
  // Exponential backoff: baseDelay * 2^attempt
  const exponentialDelay = baseDelayMs * Math.pow(2, Math.max(0, attempt));

  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (!jitter) {
    return Math.floor(cappedDelay);
  }

  // Add jitter (+/-25%)
  const spread = cappedDelay * 0.25 * (Math.random() * 2 - 1);

  return Math.floor(cappedDelay + spread);
}

/**
 * Run an operation under a retry policy. The last error is rethrown unchanged
 * once attempts run out or a failure is not retryable.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const shouldRetry = options.isRetryable ?? isRetryable;
  const wait = options.sleep ?? ((ms: number) => sleep(ms));
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = calculateBackoffDelay(
        attempt - 1,
        policy.baseDelayMs,
        policy.maxDelayMs,
        policy.jitter ?? true
      );
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
