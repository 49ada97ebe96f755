/**
 * LiveFetcher - persistent connection with reconnect
 *
 * Reads the room's live stream and reconnects after drops with exponential
 * backoff. The failure count resets once a connection delivers an event.
 * Non-retryable failures (authentication, missing room, other 4xx) end the
 * fetcher, as does running out of reconnect attempts.
 */

import {
  type AppError,
  type BackoffPolicy,
  DEFAULT_BACKOFF,
  RECONNECT_MAX_ATTEMPTS,
  TransportError,
  computeBackoffDelay,
  getErrorMessage,
  isAppError,
  isCancellation,
  isRetryableError,
  sleep,
} from '@fireside/core';
import type { StreamTransport } from '../transport/types.js';
import type { Fetcher, FetcherContext } from './fetcher.js';
import { getLog } from '../log.js';

const log = getLog('LiveFetcher');

export interface LiveFetcherOptions {
  backoff?: Partial<BackoffPolicy>;
  /** Consecutive failed attempts before giving up (default: unlimited) */
  maxReconnectAttempts?: number | null;
  /** Jitter source, for deterministic delays */
  random?: () => number;
}

function toStreamError(error: unknown, roomId: number): AppError {
  if (isAppError(error)) return error;
  return new TransportError(`Live stream for room ${roomId} failed: ${getErrorMessage(error)}`, { cause: error });
}

export class LiveFetcher implements Fetcher {
  readonly mode = 'live' as const;
  private readonly policy: BackoffPolicy;
  private readonly maxReconnectAttempts: number | null;
  private readonly random: () => number;

  constructor(
    private readonly transport: StreamTransport,
    options: LiveFetcherOptions = {}
  ) {
    this.policy = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.maxReconnectAttempts =
      options.maxReconnectAttempts === undefined ? RECONNECT_MAX_ATTEMPTS : options.maxReconnectAttempts;
    this.random = options.random ?? Math.random;
  }

  async run(context: FetcherContext): Promise<void> {
    const { roomId, signal } = context;
    let failures = 0;

    while (!signal.aborted) {
      let failure: AppError;

      try {
        log.debug(`Connecting to room ${roomId}`);
        for await (const raw of this.transport.openLiveStream(roomId, signal)) {
          failures = 0;
          await context.emit(raw);
        }
        if (signal.aborted) return;
        failure = new TransportError(`Live stream for room ${roomId} closed by the server`);
      } catch (error) {
        if (isCancellation(error, signal)) return;
        failure = toStreamError(error, roomId);
      }

      if (!isRetryableError(failure)) {
        log.error(`Live stream for room ${roomId} failed permanently`, { error: failure.message });
        context.report(failure);
        return;
      }

      failures++;
      context.report(failure);

      if (this.maxReconnectAttempts !== null && failures > this.maxReconnectAttempts) {
        const exhausted = new TransportError(
          `Giving up on room ${roomId} after ${this.maxReconnectAttempts} reconnect attempts`,
          { retryable: false, cause: failure }
        );
        log.error(exhausted.message);
        context.report(exhausted);
        return;
      }

      const delayMs = computeBackoffDelay(failures - 1, this.policy, this.random);
      log.warn(`Live stream for room ${roomId} dropped, reconnecting in ${delayMs}ms`, {
        attempt: failures,
        error: failure.message,
      });

      try {
        await sleep(delayMs, signal);
      } catch (error) {
        if (isCancellation(error, signal)) return;
        throw error;
      }
    }
  }
}
