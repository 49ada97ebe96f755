import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../log.js', () => ({
  getLog: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() }),
}));

import { AuthenticationError, TransportError, type AppError } from '@fireside/core';
import { LiveFetcher } from './live-fetcher.js';
import type { FetcherContext } from './fetcher.js';
import { FakeStreamTransport, liveConnection, rawEvent } from '../test-helpers.js';

const FAST_BACKOFF = { initialDelayMs: 1, maxDelayMs: 1, multiplier: 1, jitter: false };

describe('LiveFetcher', () => {
  let transport: FakeStreamTransport;
  let controller: AbortController;
  let emitted: unknown[];
  let reported: AppError[];

  beforeEach(() => {
    transport = new FakeStreamTransport();
    controller = new AbortController();
    emitted = [];
    reported = [];
  });

  function context(overrides: Partial<FetcherContext> = {}): FetcherContext {
    return {
      roomId: 1,
      signal: controller.signal,
      emit: async (raw) => {
        emitted.push(raw);
      },
      report: (error) => {
        reported.push(error);
      },
      ...overrides,
    };
  }

  it('emits events of the live connection in order', async () => {
    const events = [rawEvent('EnterMessage'), rawEvent('TextMessage', { body: 'hi' })];
    transport.connections.push(liveConnection(events));
    const fetcher = new LiveFetcher(transport);

    const running = fetcher.run(
      context({
        emit: async (raw) => {
          emitted.push(raw);
          if (emitted.length === 2) controller.abort();
        },
      })
    );
    await running;

    expect(fetcher.mode).toBe('live');
    expect(emitted).toEqual(events);
    expect(reported).toEqual([]);
  });

  it('treats a server close as a drop and reconnects', async () => {
    transport.connections.push(liveConnection([], 'close'), liveConnection([rawEvent('EnterMessage')]));
    const fetcher = new LiveFetcher(transport, { backoff: FAST_BACKOFF });

    await fetcher.run(
      context({
        emit: async (raw) => {
          emitted.push(raw);
          controller.abort();
        },
      })
    );

    expect(transport.opened).toBe(2);
    expect(reported.map((e) => e.message)).toEqual(['Live stream for room 1 closed by the server']);
    expect(emitted).toHaveLength(1);
  });

  it('ends on a non-retryable failure', async () => {
    transport.connections.push(liveConnection([], new TransportError('HTTP 403 from room/1/live.json', { status: 403 })));
    const fetcher = new LiveFetcher(transport, { backoff: FAST_BACKOFF });

    await fetcher.run(context());

    expect(transport.opened).toBe(1);
    expect(reported).toHaveLength(1);
    expect(reported[0]).toBeInstanceOf(TransportError);
  });

  it('ends on an authentication failure', async () => {
    transport.connections.push(liveConnection([], new AuthenticationError()));
    await new LiveFetcher(transport, { backoff: FAST_BACKOFF }).run(context());

    expect(reported).toHaveLength(1);
    expect(reported[0]).toBeInstanceOf(AuthenticationError);
  });

  it('wraps unknown failures as retryable transport errors', async () => {
    transport.connections.push(liveConnection([], new Error('ECONNRESET')));
    const fetcher = new LiveFetcher(transport, { backoff: FAST_BACKOFF });

    await fetcher.run(
      context({
        report: (error) => {
          reported.push(error);
          controller.abort();
        },
      })
    );

    expect(reported).toHaveLength(1);
    expect(reported[0]).toBeInstanceOf(TransportError);
    expect(reported[0]?.message).toBe('Live stream for room 1 failed: ECONNRESET');
  });

  it('gives up after maxReconnectAttempts consecutive failures', async () => {
    for (let i = 0; i < 3; i++) {
      transport.connections.push(liveConnection([], 'close'));
    }
    const fetcher = new LiveFetcher(transport, { backoff: FAST_BACKOFF, maxReconnectAttempts: 2 });

    await fetcher.run(context());

    expect(transport.opened).toBe(3);
    expect(reported).toHaveLength(4);
    expect(reported[3]?.message).toBe('Giving up on room 1 after 2 reconnect attempts');
  });

  it('resets the failure count once a connection delivers data', async () => {
    transport.connections.push(
      liveConnection([], 'close'),
      liveConnection([rawEvent('EnterMessage')], 'close'),
      liveConnection([], 'close')
    );
    const fetcher = new LiveFetcher(transport, { backoff: FAST_BACKOFF, maxReconnectAttempts: 1 });

    await fetcher.run(context());

    expect(transport.opened).toBe(3);
    expect(emitted).toHaveLength(1);
    expect(reported.map((e) => e.message)).toEqual([
      'Live stream for room 1 closed by the server',
      'Live stream for room 1 closed by the server',
      'Live stream for room 1 closed by the server',
      'Giving up on room 1 after 1 reconnect attempts',
    ]);
  });

  it('stops during the backoff wait', async () => {
    transport.connections.push(liveConnection([], 'close'));
    const fetcher = new LiveFetcher(transport, { backoff: { initialDelayMs: 60_000, jitter: false } });

    await fetcher.run(
      context({
        report: (error) => {
          reported.push(error);
          controller.abort();
        },
      })
    );

    expect(transport.opened).toBe(1);
    expect(reported).toHaveLength(1);
  });

  it('returns immediately when already stopped', async () => {
    controller.abort();
    await new LiveFetcher(transport).run(context());
    expect(transport.opened).toBe(0);
  });
});
