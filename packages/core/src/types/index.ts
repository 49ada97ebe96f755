/**
 * Core types for Fireside
 * @packageDocumentation
 */

// Error classes
export {
  AppError,
  ValidationError,
  NotFoundError,
  AuthenticationError,
  TransportError,
  UploadTransportError,
  ListenerError,
  AlreadyStartedError,
  NotStartedError,
  FileNotFoundError,
  CancelledError,
  InternalError,
  isRetryableStatus,
  isAppError,
  toAppError,
  getErrorMessage,
} from './errors.js';
