/**
 * Dispatcher - sequential listener delivery
 *
 * Takes messages off the stream's queue in order and hands each to every
 * listener, in attachment order, before taking the next. A failing listener
 * is reported and skipped.
 */

import { type AppError, type BoundedQueue, ListenerError, getErrorMessage, isCancellation } from '@fireside/core';
import type { Message, MessageListener } from '../types/index.js';
import { getLog } from '../log.js';

const log = getLog('Dispatcher');

export interface DispatcherOptions {
  queue: BoundedQueue<Message>;
  /** Current listener list; read once per message */
  listeners: () => readonly MessageListener[];
  report: (error: AppError) => void;
}

export class Dispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  /**
   * Deliver until the queue is closed and drained, or `signal` fires. A
   * fired signal takes effect after the message being delivered.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let next: IteratorResult<Message, undefined>;
      try {
        next = await this.options.queue.pop(signal);
      } catch (error) {
        if (isCancellation(error, signal)) return;
        throw error;
      }

      if (next.done) return;
      await this.deliver(next.value);
    }
  }

  async deliver(message: Message): Promise<void> {
    for (const listener of this.options.listeners()) {
      try {
        await listener(message);
      } catch (error) {
        const failure = new ListenerError(message.id, { cause: error });
        log.warn(failure.message, { kind: message.kind, error: getErrorMessage(error) });
        this.options.report(failure);
      }
    }
  }
}
