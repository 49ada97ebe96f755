/**
 * UploadController - lifecycle of one upload
 *
 *   idle → uploading → completed | failed | cancelled
 *
 * Usage:
 *   const upload = new UploadController({
 *     roomId: 42,
 *     path: './report.pdf',
 *     transport,
 *     onProgress: (sent, total) => console.log(`${sent}/${total}`),
 *   });
 *   upload.start();
 *   const state = await upload.join();
 */

import { accessSync, constants, statSync, type Stats } from 'node:fs';
import { basename } from 'node:path';
import {
  type BackoffPolicy,
  AlreadyStartedError,
  FileNotFoundError,
  NotStartedError,
  UPLOAD_CHUNK_SIZE,
  UPLOAD_MAX_RETRIES,
  createDeferred,
  getErrorMessage,
} from '@fireside/core';
import type {
  FinishedHandler,
  ProgressHandler,
  UploadErrorHandler,
  UploadState,
} from '../types/index.js';
import type { UploadTransport } from '../transport/types.js';
import { UploadWorker, toUploadError, type UploadOutcome } from './worker.js';
import { contentTypeFor } from './content-type.js';
import { getLog } from '../log.js';

const log = getLog('Upload');

export interface UploadControllerOptions {
  roomId: number;
  path: string;
  transport: UploadTransport;
  /** Default: the path's base name */
  fileName?: string;
  /** Default: guessed from the file name */
  contentType?: string;
  /** Extra form fields sent with the file */
  fields?: Readonly<Record<string, string>>;
  onProgress?: ProgressHandler;
  onFinished?: FinishedHandler;
  onError?: UploadErrorHandler;
  /** Default: 16384 */
  chunkSize?: number;
  /** Default: 2 */
  maxRetries?: number;
  backoff?: Partial<BackoffPolicy>;
}

export class UploadController {
  readonly fileName: string;

  private currentState: UploadState = 'idle';
  private sent = 0;
  private total = 0;
  private readonly abortController = new AbortController();
  private readonly terminal = createDeferred<UploadState>();

  constructor(private readonly options: UploadControllerOptions) {
    this.fileName = options.fileName ?? basename(options.path);
  }

  get state(): UploadState {
    return this.currentState;
  }

  get bytesSent(): number {
    return this.sent;
  }

  get bytesTotal(): number {
    return this.total;
  }

  /** Advisory */
  isUploading(): boolean {
    return this.currentState === 'uploading';
  }

  /**
   * Begin the transfer. Throws FileNotFoundError synchronously when the
   * path is not a readable file, AlreadyStartedError on a second call.
   */
  start(): void {
    if (this.currentState !== 'idle') {
      throw new AlreadyStartedError(`Upload of ${this.fileName}`);
    }

    this.total = this.checkFile();
    this.currentState = 'uploading';
    log.info(`Uploading ${this.fileName} to room ${this.options.roomId}`, { bytes: this.total });

    const worker = new UploadWorker({
      roomId: this.options.roomId,
      path: this.options.path,
      fileName: this.fileName,
      contentType: this.options.contentType ?? contentTypeFor(this.fileName),
      size: this.total,
      transport: this.options.transport,
      fields: this.options.fields,
      chunkSize: this.options.chunkSize ?? UPLOAD_CHUNK_SIZE,
      maxRetries: this.options.maxRetries ?? UPLOAD_MAX_RETRIES,
      backoff: this.options.backoff,
      onProgress: (bytesSent) => this.progress(bytesSent),
    });

    worker
      .run(this.abortController.signal)
      .then((outcome) => this.settle(outcome))
      .catch((error: unknown) => {
        this.settle({ status: 'failed', error: toUploadError(this.fileName, error) });
      });
  }

  /**
   * Cancel. No-op once the upload has ended.
   */
  stop(): void {
    if (this.currentState === 'idle') {
      this.settle({ status: 'cancelled' });
      return;
    }
    if (this.currentState !== 'uploading') return;

    log.info(`Cancelling upload of ${this.fileName}`);
    this.abortController.abort();
  }

  /**
   * Resolves with the terminal state. Throws NotStartedError synchronously
   * before start().
   */
  join(): Promise<UploadState> {
    if (this.currentState === 'idle') {
      throw new NotStartedError(`Upload of ${this.fileName}`);
    }
    return this.terminal.promise;
  }

  private checkFile(): number {
    let stats: Stats;
    try {
      accessSync(this.options.path, constants.R_OK);
      stats = statSync(this.options.path);
    } catch (error) {
      throw new FileNotFoundError(this.options.path, { cause: error });
    }
    if (!stats.isFile()) {
      throw new FileNotFoundError(this.options.path);
    }
    return stats.size;
  }

  private progress(bytesSent: number): void {
    if (this.currentState !== 'uploading') return;
    this.sent = bytesSent;
    this.invoke('progress', () => this.options.onProgress?.(bytesSent, this.total));
  }

  private settle(outcome: UploadOutcome): void {
    if (this.terminal.settled) return;

    this.currentState = outcome.status;
    this.terminal.resolve(outcome.status);

    switch (outcome.status) {
      case 'completed': {
        const file = outcome.file;
        log.info(`Uploaded ${this.fileName}`, { id: file.id });
        this.invoke('finished', () => this.options.onFinished?.(file));
        break;
      }
      case 'failed': {
        const error = outcome.error;
        log.error(error.message);
        this.invoke('error', () => this.options.onError?.(error));
        break;
      }
      case 'cancelled':
        log.info(`Upload of ${this.fileName} cancelled`, { bytesSent: this.sent });
        break;
    }
  }

  private invoke(name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      log.error(`Upload ${name} callback threw`, { error: getErrorMessage(error) });
    }
  }
}
