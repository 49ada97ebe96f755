/**
 * Async primitives: cancellation, bounded queue, retry
 */

export { cancelledBy, throwIfAborted, isCancellation, sleep, abortable } from './abort.js';
export { createDeferred, type Deferred } from './deferred.js';
export { BoundedQueue } from './bounded-queue.js';
export {
  DEFAULT_BACKOFF,
  computeBackoffDelay,
  isRetryableError,
  withRetry,
  type BackoffPolicy,
  type RetryConfig,
} from './retry.js';
