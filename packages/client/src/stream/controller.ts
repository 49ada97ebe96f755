/**
 * StreamController - message stream of one room
 *
 * Owns a fetcher (live or polling) and a dispatcher connected by a bounded
 * queue, plus their lifecycle:
 *
 *   idle → running → stopping → stopped
 *
 * Usage:
 *   const stream = new StreamController({ roomId: 42, transport, membership: room });
 *   stream.attach((message) => console.log(message.kind));
 *   await stream.start();
 *   ...
 *   stream.stop();
 *   await stream.join();
 */

import {
  type AppError,
  type BackoffPolicy,
  AlreadyStartedError,
  BoundedQueue,
  NotStartedError,
  STREAM_QUEUE_CAPACITY,
  abortable,
  createDeferred,
  getErrorMessage,
  isCancellation,
  toAppError,
} from '@fireside/core';
import type {
  Message,
  MessageListener,
  StreamErrorHandler,
  StreamMode,
  StreamState,
} from '../types/index.js';
import type { RoomMembership, StreamTransport } from '../transport/types.js';
import { classifyEvent } from '../messages/classifier.js';
import type { Fetcher } from './fetcher.js';
import { LiveFetcher } from './live-fetcher.js';
import { PollingFetcher } from './polling-fetcher.js';
import { Dispatcher } from './dispatcher.js';
import { enrichUploadEvent } from './enrich.js';
import { getLog } from '../log.js';

const log = getLog('Stream');

export interface StreamControllerOptions {
  roomId: number;
  transport: StreamTransport;
  /** Default: 'live' */
  mode?: StreamMode;
  /** Joined before a live stream starts */
  membership?: RoomMembership;
  onError?: StreamErrorHandler;
  /** Default: 100 */
  queueCapacity?: number;
  /** Polling tick (default: 1000) */
  pollIntervalMs?: number;
  /** Polling dedup memory (default: 5000) */
  seenCacheSize?: number;
  /** Live reconnect backoff */
  backoff?: Partial<BackoffPolicy>;
  /** Live reconnect limit (default: unlimited) */
  maxReconnectAttempts?: number | null;
  /** Replaces the fetcher `mode` would pick */
  fetcher?: Fetcher;
}

export class StreamController {
  readonly roomId: number;
  readonly mode: StreamMode;

  private currentState: StreamState = 'idle';
  private listeners: readonly MessageListener[] = [];
  private readonly abortController = new AbortController();
  private readonly stopped = createDeferred<void>();
  private readonly fetcher: Fetcher;

  constructor(private readonly options: StreamControllerOptions) {
    this.roomId = options.roomId;
    this.fetcher = options.fetcher ?? this.createFetcher(options.mode ?? 'live');
    this.mode = this.fetcher.mode;
  }

  get state(): StreamState {
    return this.currentState;
  }

  isStreaming(): boolean {
    return this.currentState === 'running';
  }

  // ==========================================================================
  // Listeners
  // ==========================================================================

  /**
   * Register a listener. Returns a function that detaches it again.
   */
  attach(listener: MessageListener): () => void {
    if (!this.listeners.includes(listener)) {
      this.listeners = [...this.listeners, listener];
    }
    return () => {
      this.detach(listener);
    };
  }

  detach(listener: MessageListener): boolean {
    if (!this.listeners.includes(listener)) return false;
    this.listeners = this.listeners.filter((l) => l !== listener);
    return true;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Start streaming. Throws AlreadyStartedError synchronously on a second
   * call. A live stream joins the room first; the returned promise rejects
   * when that fails.
   */
  start(): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new AlreadyStartedError(`Stream for room ${this.roomId}`);
    }
    this.currentState = 'running';
    log.info(`Starting ${this.mode} stream for room ${this.roomId}`);
    return this.launch();
  }

  /**
   * Request shutdown. Idempotent; returns immediately.
   */
  stop(): void {
    if (this.currentState === 'stopping' || this.currentState === 'stopped') return;

    if (this.currentState === 'idle') {
      this.finish();
      return;
    }

    log.info(`Stopping stream for room ${this.roomId}`);
    this.currentState = 'stopping';
    this.abortController.abort();
  }

  /**
   * Resolves once the stream has stopped. Throws NotStartedError
   * synchronously before start().
   */
  join(): Promise<void> {
    if (this.currentState === 'idle') {
      throw new NotStartedError(`Stream for room ${this.roomId}`);
    }
    return this.stopped.promise;
  }

  private async launch(): Promise<void> {
    const signal = this.abortController.signal;

    if (this.mode === 'live' && this.options.membership) {
      try {
        await abortable(this.options.membership.join(), signal);
      } catch (error) {
        if (isCancellation(error, signal)) {
          this.finish();
          return;
        }
        const failure = toAppError(error);
        log.error(`Could not join room ${this.roomId}`, { error: failure.message });
        this.report(failure);
        this.finish();
        throw failure;
      }
    }

    if (signal.aborted) {
      this.finish();
      return;
    }

    this.supervise(signal).catch((error: unknown) => {
      log.error(`Stream for room ${this.roomId} crashed`, { error: getErrorMessage(error) });
      this.finish();
    });
  }

  private async supervise(signal: AbortSignal): Promise<void> {
    const queue = new BoundedQueue<Message>(this.options.queueCapacity ?? STREAM_QUEUE_CAPACITY);
    const dispatcher = new Dispatcher({
      queue,
      listeners: () => this.listeners,
      report: (error) => this.report(error),
    });

    const fetching = this.runFetcher(queue, signal);
    const dispatching = dispatcher.run(signal).catch((error: unknown) => {
      this.report(toAppError(error));
    });

    await Promise.all([fetching, dispatching]);
    this.finish();
  }

  private async runFetcher(queue: BoundedQueue<Message>, signal: AbortSignal): Promise<void> {
    try {
      await this.fetcher.run({
        roomId: this.roomId,
        signal,
        emit: async (raw) => {
          const enriched = await enrichUploadEvent(raw, this.options.transport, this.roomId, signal);
          await queue.push(classifyEvent(enriched), signal);
        },
        report: (error) => this.report(error),
      });
    } catch (error) {
      if (!isCancellation(error, signal)) {
        this.report(toAppError(error));
      }
    } finally {
      queue.close();
    }

    if (!signal.aborted) {
      log.info(`Fetcher for room ${this.roomId} ended, draining queued messages`, { queued: queue.size });
    }
  }

  private finish(): void {
    if (this.currentState === 'stopped') return;
    this.currentState = 'stopped';
    this.stopped.resolve();
    log.info(`Stream for room ${this.roomId} stopped`);
  }

  private report(error: AppError): void {
    const handler = this.options.onError;
    if (!handler) return;

    try {
      const result: unknown = handler(error);
      if (result instanceof Promise) {
        result.catch((callbackError: unknown) => {
          log.error('Stream error callback rejected', { error: getErrorMessage(callbackError) });
        });
      }
    } catch (callbackError) {
      log.error('Stream error callback threw', { error: getErrorMessage(callbackError) });
    }
  }

  private createFetcher(mode: StreamMode): Fetcher {
    if (mode === 'polling') {
      return new PollingFetcher(this.options.transport, {
        intervalMs: this.options.pollIntervalMs,
        seenCacheSize: this.options.seenCacheSize,
      });
    }
    return new LiveFetcher(this.options.transport, {
      backoff: this.options.backoff,
      maxReconnectAttempts: this.options.maxReconnectAttempts,
    });
  }
}
