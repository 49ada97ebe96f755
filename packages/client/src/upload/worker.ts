/**
 * UploadWorker - one file transfer
 *
 * Streams the file to the transport in fixed-size chunks. Progress is
 * reported when the transport pulls the next chunk, i.e. once the previous
 * one has been handed on; the full size is reported only after the server
 * accepted the file. Transient failures restart the transfer, and progress
 * stays silent until it passes the previous high-water mark.
 */

import { createReadStream } from 'node:fs';
import {
  type BackoffPolicy,
  TransportError,
  UploadTransportError,
  getErrorMessage,
  isCancellation,
  isRetryableError,
  throwIfAborted,
  withRetry,
} from '@fireside/core';
import type { UploadedFile } from '../types/index.js';
import type { UploadTransport } from '../transport/types.js';
import { getLog } from '../log.js';

const log = getLog('UploadWorker');

export type UploadOutcome =
  | { status: 'completed'; file: UploadedFile }
  | { status: 'failed'; error: UploadTransportError }
  | { status: 'cancelled' };

export interface UploadWorkerOptions {
  roomId: number;
  path: string;
  fileName: string;
  contentType: string;
  /** File size at start */
  size: number;
  transport: UploadTransport;
  fields?: Readonly<Record<string, string>>;
  chunkSize: number;
  maxRetries: number;
  backoff?: Partial<BackoffPolicy>;
  onProgress: (bytesSent: number) => void;
}

export function toUploadError(fileName: string, error: unknown): UploadTransportError {
  if (error instanceof UploadTransportError) return error;
  if (error instanceof TransportError) {
    return new UploadTransportError(fileName, error.message, {
      status: error.status,
      url: error.url,
      retryable: error.retryable,
      cause: error,
    });
  }
  return new UploadTransportError(fileName, getErrorMessage(error), { retryable: false, cause: error });
}

export class UploadWorker {
  private highWater = 0;

  constructor(private readonly options: UploadWorkerOptions) {}

  /**
   * Transfer the file. Never rejects; the outcome says how it ended.
   */
  async run(signal: AbortSignal): Promise<UploadOutcome> {
    const { roomId, fileName, contentType, size, transport, fields } = this.options;

    try {
      const file = await withRetry(
        (attempt) => {
          log.debug(`Uploading ${fileName} to room ${roomId}`, { attempt: attempt + 1, size });
          return transport.uploadFile(
            roomId,
            { fileName, contentType, size, body: this.readChunks(signal), fields },
            signal
          );
        },
        {
          maxRetries: this.options.maxRetries,
          backoff: this.options.backoff,
          retryable: isRetryableError,
          signal,
        }
      );

      this.options.onProgress(size);
      return { status: 'completed', file };
    } catch (error) {
      if (isCancellation(error, signal)) {
        return { status: 'cancelled' };
      }
      return { status: 'failed', error: toUploadError(fileName, error) };
    }
  }

  private async *readChunks(signal: AbortSignal): AsyncGenerator<Uint8Array, void, undefined> {
    const chunks: AsyncIterable<Buffer> = createReadStream(this.options.path, {
      highWaterMark: this.options.chunkSize,
    });
    let sent = 0;

    for await (const chunk of chunks) {
      throwIfAborted(signal);
      if (sent > 0) this.progress(sent);
      yield chunk;
      sent += chunk.length;
    }
    throwIfAborted(signal);
  }

  private progress(sent: number): void {
    if (sent <= this.highWater || sent >= this.options.size) return;
    this.highWater = sent;
    this.options.onProgress(sent);
  }
}
