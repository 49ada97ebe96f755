/**
 * Fetcher contract
 *
 * A fetcher retrieves raw events for one room until its signal fires or it
 * hits a fatal failure. It reports failures through `report` and resolves
 * when done; cancellation is not a failure.
 */

import type { AppError } from '@fireside/core';
import type { StreamMode } from '../types/index.js';

export interface FetcherContext {
  readonly roomId: number;
  readonly signal: AbortSignal;
  /** Hand one raw event on; waits while the stream's queue is full */
  emit(raw: unknown): Promise<void>;
  report(error: AppError): void;
}

export interface Fetcher {
  readonly mode: StreamMode;
  run(context: FetcherContext): Promise<void>;
}
