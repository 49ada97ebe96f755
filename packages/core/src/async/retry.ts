/**
 * Retry and backoff
 *
 * Exponential backoff shared by live-stream reconnects and upload retries.
 */

import { TransportError, getErrorMessage } from '../types/errors.js';
import { getLog } from '../services/get-log.js';
import { cancelledBy, sleep } from './abort.js';
import {
  RECONNECT_BACKOFF_MULTIPLIER,
  RECONNECT_INITIAL_DELAY_MS,
  RECONNECT_MAX_DELAY_MS,
} from '../config/defaults.js';

const log = getLog('Retry');

/**
 * Backoff configuration
 */
export interface BackoffPolicy {
  /** Delay before the first retry (default: 1000) */
  initialDelayMs: number;
  /** Upper bound for any delay (default: 120000) */
  maxDelayMs: number;
  /** Growth factor per attempt (default: 2) */
  multiplier: number;
  /** Spread delays by ±25% (default: true) */
  jitter: boolean;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialDelayMs: RECONNECT_INITIAL_DELAY_MS,
  maxDelayMs: RECONNECT_MAX_DELAY_MS,
  multiplier: RECONNECT_BACKOFF_MULTIPLIER,
  jitter: true,
};

/**
 * Delay before retry number `attempt` (0-based):
 * initialDelay * multiplier^attempt, capped at maxDelay, then jittered.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  let delay = policy.initialDelayMs * Math.pow(policy.multiplier, attempt);
  delay = Math.min(delay, policy.maxDelayMs);

  if (policy.jitter) {
    const jitter = delay * 0.25 * (random() * 2 - 1);
    delay = Math.max(0, delay + jitter);
  }

  return Math.round(delay);
}

/**
 * Transport errors say whether they are worth repeating; anything else is not.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TransportError && error.retryable;
}

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  backoff?: Partial<BackoffPolicy>;
  retryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  signal?: AbortSignal;
}

/**
 * Run `operation` until it resolves or fails for good. A fired `signal`
 * ends the loop with CancelledError, also during the wait between attempts.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig
): Promise<T> {
  const policy: BackoffPolicy = { ...DEFAULT_BACKOFF, ...config.backoff };
  const retryable = config.retryable ?? isRetryableError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (config.signal?.aborted) {
        throw cancelledBy(config.signal);
      }
      if (attempt >= config.maxRetries || !retryable(error)) {
        throw error;
      }

      const delayMs = computeBackoffDelay(attempt, policy);
      log.info(`Attempt ${attempt + 1}/${config.maxRetries + 1} failed, retrying in ${delayMs}ms`, {
        error: getErrorMessage(error),
      });
      config.onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs, config.signal);
    }
  }
}
