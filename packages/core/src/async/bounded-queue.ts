/**
 * BoundedQueue - async FIFO with a fixed capacity
 *
 * push() waits while the queue is full and pop() waits while it is empty;
 * both waits observe an AbortSignal. close() lets consumers drain what is
 * left and then see `done`, while further pushes are refused.
 */

import { CancelledError, InternalError } from '../types/errors.js';
import { cancelledBy, throwIfAborted } from './abort.js';

type Waiter = () => void;

export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly pushWaiters = new Set<Waiter>();
  private readonly popWaiters = new Set<Waiter>();
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InternalError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Append an item, waiting for space when full.
   * Rejects with CancelledError when the signal fires or the queue is closed.
   */
  async push(item: T, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    while (this.items.length >= this.capacity && !this.isClosed) {
      await this.wait(this.pushWaiters, signal);
    }
    if (this.isClosed) {
      throw new CancelledError('Queue is closed');
    }

    this.items.push(item);
    this.wakeOne(this.popWaiters);
  }

  /**
   * Take the oldest item, waiting while empty.
   * Resolves `{ done: true }` once the queue is closed and drained.
   */
  async pop(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    throwIfAborted(signal);
    while (this.items.length === 0 && !this.isClosed) {
      await this.wait(this.popWaiters, signal);
    }

    if (this.items.length === 0) {
      return { done: true, value: undefined };
    }

    const value = this.items[0];
    this.items.splice(0, 1);
    this.wakeOne(this.pushWaiters);
    return { done: false, value };
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const wake of [...this.pushWaiters, ...this.popWaiters]) {
      wake();
    }
  }

  private wait(waiters: Set<Waiter>, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        waiters.delete(wake);
        reject(cancelledBy(signal));
      };
      const wake: Waiter = () => {
        waiters.delete(wake);
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      waiters.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private wakeOne(waiters: Set<Waiter>): void {
    const next = waiters.values().next();
    if (!next.done) {
      next.value();
    }
  }
}
