/**
 * Collaborator contracts consumed by the engine
 *
 * The stream and upload machinery only ever talks to these interfaces;
 * HttpChatTransport implements them against the chat API, tests use
 * in-process fakes.
 */

import type { UploadedFile } from '../types/index.js';

/**
 * Source of raw room events
 */
export interface StreamTransport {
  /**
   * Open the room's live event stream. The iterable ends when the server
   * closes the connection and throws TransportError when it drops.
   */
  openLiveStream(roomId: number, signal: AbortSignal): AsyncIterable<unknown>;

  /** Full recent transcript of the room */
  getTranscript(roomId: number, signal: AbortSignal): Promise<unknown[]>;

  /** Messages newer than `sinceId` */
  getRecentMessages(roomId: number, sinceId: number, signal: AbortSignal): Promise<unknown[]>;

  /** Stored-file details of an upload message */
  getUploadDetails?(roomId: number, messageId: number, signal: AbortSignal): Promise<unknown>;
}

/**
 * One file transfer. `body` yields the file content in chunks; the transport
 * pulls the next chunk only after handing the previous one on.
 */
export interface UploadRequest {
  fileName: string;
  contentType: string;
  size: number;
  body: AsyncIterable<Uint8Array>;
  /** Form fields posted alongside the file */
  fields?: Readonly<Record<string, string>>;
}

export interface UploadTransport {
  uploadFile(roomId: number, request: UploadRequest, signal: AbortSignal): Promise<UploadedFile>;
}

/**
 * Room membership, the precondition of a live stream
 */
export interface RoomMembership {
  join(): Promise<void>;
  leave(): Promise<void>;
}
