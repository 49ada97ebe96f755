/**
 * HttpChatTransport
 *
 * StreamTransport and UploadTransport over the chat API's HTTP endpoints.
 */

import { STREAMING_URL, TransportError, getErrorMessage, isCancellation, cancelledBy } from '@fireside/core';
import type { UploadedFile } from '../types/index.js';
import type { StreamTransport, UploadRequest, UploadTransport } from './types.js';
import type { HttpConnection } from './connection.js';
import { decodeLiveStream } from './live-decoder.js';
import { createBoundary, multipartBody, multipartContentType } from './multipart.js';
import { eventListSchema, parseResponse, uploadedFileSchema } from './schemas.js';
import { getLog } from '../log.js';

const log = getLog('HttpTransport');

/** Form field the uploads endpoint reads the file from */
export const UPLOAD_FIELD = 'upload';

export interface HttpChatTransportOptions {
  /** Host of the live streaming endpoint (default: STREAMING_URL) */
  streamingUrl?: string;
}

export class HttpChatTransport implements StreamTransport, UploadTransport {
  private readonly streamingUrl: string;

  constructor(
    private readonly connection: HttpConnection,
    options: HttpChatTransportOptions = {}
  ) {
    this.streamingUrl = (options.streamingUrl ?? STREAMING_URL).replace(/\/+$/, '');
  }

  async *openLiveStream(roomId: number, signal: AbortSignal): AsyncGenerator<unknown, void, undefined> {
    const url = `${this.streamingUrl}/room/${roomId}/live.json`;
    const response = await this.connection.raw('GET', url, { signal, timeoutMs: null });
    if (!response.body) {
      throw new TransportError(`Live stream for room ${roomId} has no body`, { url });
    }

    log.info(`Live stream opened for room ${roomId}`);
    try {
      yield* decodeLiveStream(response.body);
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw cancelledBy(signal);
      }
      throw new TransportError(`Live stream for room ${roomId} dropped: ${getErrorMessage(error)}`, {
        url,
        cause: error,
      });
    }
  }

  async getTranscript(roomId: number, signal: AbortSignal): Promise<unknown[]> {
    const data = await this.connection.get(`room/${roomId}/transcript`, { signal, key: 'messages' });
    return parseResponse(eventListSchema, data, 'transcript');
  }

  async getRecentMessages(roomId: number, sinceId: number, signal: AbortSignal): Promise<unknown[]> {
    const data = await this.connection.get(`room/${roomId}/recent`, {
      signal,
      key: 'messages',
      params: { since_message_id: sinceId },
    });
    return parseResponse(eventListSchema, data, 'recent messages');
  }

  getUploadDetails(roomId: number, messageId: number, signal: AbortSignal): Promise<unknown> {
    return this.connection.get(`room/${roomId}/messages/${messageId}/upload`, { signal, key: 'upload' });
  }

  async uploadFile(roomId: number, request: UploadRequest, signal: AbortSignal): Promise<UploadedFile> {
    const boundary = createBoundary();
    const body = multipartBody(
      boundary,
      {
        fieldName: UPLOAD_FIELD,
        fileName: request.fileName,
        contentType: request.contentType,
        content: request.body,
      },
      request.fields
    );

    const response = await this.connection.raw('POST', `room/${roomId}/uploads`, {
      signal,
      timeoutMs: null,
      headers: {
        Accept: 'application/json',
        'Content-Type': multipartContentType(boundary),
      },
      body,
    });

    const data: unknown = await response.json();
    const upload = typeof data === 'object' && data !== null && 'upload' in data ? data.upload : data;
    return parseResponse(uploadedFileSchema, upload, 'upload');
  }
}
