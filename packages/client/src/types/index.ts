/**
 * Public types of the Fireside engine
 */

import type { AppError, UploadTransportError } from '@fireside/core';

// ============================================================================
// Messages
// ============================================================================

export type MessageKind = 'enter' | 'leave' | 'tweet' | 'text' | 'upload' | 'topic-change' | 'other';

/**
 * Acting user of a message
 */
export interface MessageUser {
  id: number;
  name?: string;
}

interface MessageBase {
  /** Server-assigned id, null when the server omitted it */
  readonly id: number | null;
  readonly timestamp: Date | null;
  readonly roomId: number | null;
  /** Absent for system events */
  readonly user?: Readonly<MessageUser>;
}

export interface TweetPayload {
  author: string;
  text: string;
  url: string;
}

export interface UploadPayload {
  fileName: string;
  url: string;
}

export interface EnterMessage extends MessageBase {
  readonly kind: 'enter';
}

export interface LeaveMessage extends MessageBase {
  readonly kind: 'leave';
}

export interface TextMessage extends MessageBase {
  readonly kind: 'text';
  readonly body: string;
  /** Multi-line paste */
  readonly paste: boolean;
}

export interface TopicChangeMessage extends MessageBase {
  readonly kind: 'topic-change';
  readonly body: string;
}

export interface TweetMessage extends MessageBase {
  readonly kind: 'tweet';
  readonly tweet: Readonly<TweetPayload>;
}

export interface UploadMessage extends MessageBase {
  readonly kind: 'upload';
  readonly upload: Readonly<UploadPayload>;
}

/**
 * Unknown or malformed event, kept for diagnostics
 */
export interface OtherMessage extends MessageBase {
  readonly kind: 'other';
  readonly rawType?: string;
  readonly raw: unknown;
}

export type Message =
  | EnterMessage
  | LeaveMessage
  | TextMessage
  | TopicChangeMessage
  | TweetMessage
  | UploadMessage
  | OtherMessage;

// ============================================================================
// Callbacks
// ============================================================================

export type MessageListener = (message: Message) => void | Promise<void>;

/**
 * Failures of a running stream: TransportError for connection problems,
 * ListenerError for listeners that threw. Never awaited.
 */
export type StreamErrorHandler = (error: AppError) => void;

export type ProgressHandler = (bytesSent: number, bytesTotal: number) => void;
export type FinishedHandler = (result: UploadedFile) => void;
export type UploadErrorHandler = (error: UploadTransportError) => void;

// ============================================================================
// Sessions
// ============================================================================

export type StreamMode = 'live' | 'polling';
export type StreamState = 'idle' | 'running' | 'stopping' | 'stopped';
export type UploadState = 'idle' | 'uploading' | 'completed' | 'failed' | 'cancelled';

// ============================================================================
// Remote resources
// ============================================================================

/**
 * Server description of a stored upload
 */
export interface UploadedFile {
  id: number;
  name: string;
  url: string;
  contentType?: string;
  byteSize?: number;
  roomId?: number;
  userId?: number;
  createdAt: Date | null;
}

export interface UserInfo {
  id: number;
  name: string;
  emailAddress?: string;
  admin?: boolean;
  avatarUrl?: string;
  apiAuthToken?: string;
}

export interface RoomInfo {
  id: number;
  name: string;
  topic: string | null;
  membershipLimit?: number;
  locked: boolean;
  full?: boolean;
  openToGuests?: boolean;
  users: UserInfo[];
  createdAt: Date | null;
  updatedAt: Date | null;
}
