/**
 * Cancellation helpers built on AbortSignal.
 *
 * Every suspension point of a background task goes through one of these so
 * that stop()/cancel takes effect within one wait.
 */

import { CancelledError } from '../types/errors.js';

/**
 * Error to reject with once `signal` has fired.
 */
export function cancelledBy(signal: AbortSignal | undefined): CancelledError {
  return new CancelledError('Operation cancelled', { cause: signal?.reason });
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw cancelledBy(signal);
  }
}

/**
 * True when `error` means "stopped on purpose" rather than "failed".
 * A transport that surfaces its own AbortError counts once the signal fired.
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (error instanceof CancelledError) return true;
  return signal?.aborted === true;
}

/**
 * Sleep for `ms`, rejecting with CancelledError as soon as `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledBy(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancelledBy(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject with CancelledError when `signal` fires first.
 * The underlying operation keeps running; pass the signal to it as well.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(cancelledBy(signal));
      return;
    }

    const onAbort = (): void => reject(cancelledBy(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
