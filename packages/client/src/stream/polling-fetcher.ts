/**
 * PollingFetcher - periodic transcript polling
 *
 * The first tick reads the full transcript, later ticks ask for messages
 * newer than the highest id seen. Only events not emitted before are passed
 * on, in ascending id order.
 */

import {
  POLL_INTERVAL_MS,
  POLL_SEEN_CACHE_SIZE,
  InternalError,
  TransportError,
  getErrorMessage,
  isAppError,
  isCancellation,
  sleep,
} from '@fireside/core';
import type { StreamTransport } from '../transport/types.js';
import type { Fetcher, FetcherContext } from './fetcher.js';
import { getLog } from '../log.js';

const log = getLog('PollingFetcher');

function eventId(raw: unknown): number | null {
  if (typeof raw !== 'object' || raw === null || !('id' in raw)) return null;
  const id = raw.id;
  return typeof id === 'number' && Number.isInteger(id) ? id : null;
}

// ============================================================================
// MessageDelta
// ============================================================================

/**
 * Remembers emitted event ids. Ids at or below `floor` count as seen once
 * they have been evicted to keep the set within `capacity`.
 */
export class MessageDelta {
  private readonly seen = new Set<number>();
  private floor = Number.NEGATIVE_INFINITY;
  private highest: number | null = null;

  constructor(private readonly capacity: number = POLL_SEEN_CACHE_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InternalError(`Seen-id capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Highest id accepted so far */
  get highestId(): number | null {
    return this.highest;
  }

  /**
   * Events of `batch` not accepted before, deduplicated, in ascending id order.
   */
  accept(batch: readonly unknown[]): unknown[] {
    const fresh = new Map<number, unknown>();

    for (const raw of batch) {
      const id = eventId(raw);
      if (id === null) {
        log.warn('Dropping polled event without an id');
        continue;
      }
      if (id <= this.floor || this.seen.has(id) || fresh.has(id)) continue;
      fresh.set(id, raw);
    }

    const ids = [...fresh.keys()].sort((a, b) => a - b);
    for (const id of ids) {
      this.seen.add(id);
      if (this.highest === null || id > this.highest) this.highest = id;
    }
    this.evict();

    return ids.map((id) => fresh.get(id));
  }

  private evict(): void {
    const excess = this.seen.size - this.capacity;
    if (excess <= 0) return;

    const oldest = [...this.seen].sort((a, b) => a - b).slice(0, excess);
    for (const id of oldest) {
      this.seen.delete(id);
      this.floor = Math.max(this.floor, id);
    }
  }
}

/**
 * Events of `next` that `previous` did not contain, ascending by id.
 */
export function computeDelta(previous: readonly unknown[], next: readonly unknown[]): unknown[] {
  const delta = new MessageDelta(Math.max(1, previous.length + next.length));
  delta.accept(previous);
  return delta.accept(next);
}

// ============================================================================
// PollingFetcher
// ============================================================================

export interface PollingFetcherOptions {
  /** Tick interval (default: 1000) */
  intervalMs?: number;
  /** Ids remembered for deduplication (default: 5000) */
  seenCacheSize?: number;
}

export class PollingFetcher implements Fetcher {
  readonly mode = 'polling' as const;
  private readonly intervalMs: number;
  private readonly seenCacheSize: number;

  constructor(
    private readonly transport: StreamTransport,
    options: PollingFetcherOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? POLL_INTERVAL_MS;
    this.seenCacheSize = options.seenCacheSize ?? POLL_SEEN_CACHE_SIZE;
  }

  async run(context: FetcherContext): Promise<void> {
    const { roomId, signal } = context;
    const delta = new MessageDelta(this.seenCacheSize);

    while (!signal.aborted) {
      try {
        const sinceId = delta.highestId;
        const batch =
          sinceId === null
            ? await this.transport.getTranscript(roomId, signal)
            : await this.transport.getRecentMessages(roomId, sinceId, signal);

        for (const raw of delta.accept(batch)) {
          await context.emit(raw);
        }
      } catch (error) {
        if (isCancellation(error, signal)) return;

        const failure = isAppError(error)
          ? error
          : new TransportError(`Polling room ${roomId} failed: ${getErrorMessage(error)}`, { cause: error });
        log.warn(`Poll of room ${roomId} failed, retrying next tick`, { error: failure.message });
        context.report(failure);
      }

      try {
        await sleep(this.intervalMs, signal);
      } catch (error) {
        if (isCancellation(error, signal)) return;
        throw error;
      }
    }
  }
}
