/**
 * @fireside/client
 *
 * Streaming and upload engine for Fireside chat rooms
 *
 * @packageDocumentation
 */

// Types
export type {
  Message,
  MessageKind,
  MessageUser,
  EnterMessage,
  LeaveMessage,
  TextMessage,
  TopicChangeMessage,
  TweetMessage,
  UploadMessage,
  OtherMessage,
  TweetPayload,
  UploadPayload,
  MessageListener,
  StreamErrorHandler,
  ProgressHandler,
  FinishedHandler,
  UploadErrorHandler,
  StreamMode,
  StreamState,
  UploadState,
  UploadedFile,
  UserInfo,
  RoomInfo,
} from './types/index.js';

// Messages
export {
  classifyEvent,
  parseTimestamp,
  parseTweetBody,
  buildOutgoingMessage,
  type OutgoingMessage,
  type OutgoingMessageType,
} from './messages/index.js';

// Transport
export type { StreamTransport, UploadTransport, UploadRequest, RoomMembership } from './transport/types.js';
export {
  HttpConnection,
  type Credentials,
  type HttpConnectionOptions,
  type FetchFn,
} from './transport/connection.js';
export { HttpChatTransport, type HttpChatTransportOptions } from './transport/http-transport.js';

// Stream
export type { Fetcher, FetcherContext } from './stream/fetcher.js';
export { LiveFetcher, type LiveFetcherOptions } from './stream/live-fetcher.js';
export {
  PollingFetcher,
  MessageDelta,
  computeDelta,
  type PollingFetcherOptions,
} from './stream/polling-fetcher.js';
export { Dispatcher } from './stream/dispatcher.js';
export { StreamController, type StreamControllerOptions } from './stream/controller.js';

// Upload
export { UploadWorker, type UploadOutcome } from './upload/worker.js';
export { UploadController, type UploadControllerOptions } from './upload/controller.js';

// Rooms & client
export { Room, type RoomStreamOptions, type RoomUploadOptions } from './rooms/room.js';
export { FiresideClient, type FiresideClientOptions } from './client.js';
