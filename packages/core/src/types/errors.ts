/**
 * Structured error classes for Fireside
 * All errors are serializable and include metadata
 */

/**
 * Base application error with structured metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation error - invalid input or response data
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly field?: string;
  readonly errors?: ReadonlyArray<{ path: string[]; message: string }>;

  constructor(
    message: string,
    options?: {
      field?: string;
      errors?: ReadonlyArray<{ path: string[]; message: string }>;
      cause?: unknown;
    }
  ) {
    super(message, options);
    this.field = options?.field;
    this.errors = options?.errors;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      errors: this.errors,
    };
  }
}

/**
 * Not found error - remote resource doesn't exist
 */
export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string, options?: { cause?: unknown }) {
    super(`${resource} not found: ${id}`, options);
    this.resource = resource;
    this.id = id;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      resource: this.resource,
      id: this.id,
    };
  }
}

/**
 * Authentication error - credentials rejected by the server
 */
export class AuthenticationError extends AppError {
  readonly code = 'AUTHENTICATION_ERROR' as const;

  constructor(message: string = 'Authentication required', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Transport error - connection drop, timeout or HTTP failure
 */
export class TransportError extends AppError {
  readonly code: string = 'TRANSPORT_ERROR';
  /** HTTP status, when the server answered */
  readonly status?: number;
  readonly url?: string;
  /** Whether repeating the request may succeed */
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { status?: number; url?: string; retryable?: boolean; cause?: unknown }
  ) {
    super(message, options);
    this.status = options?.status;
    this.url = options?.url;
    this.retryable = options?.retryable ?? isRetryableStatus(options?.status);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      url: this.url,
      retryable: this.retryable,
    };
  }
}

/**
 * Upload failure surfaced to an upload's error callback
 */
export class UploadTransportError extends TransportError {
  override readonly code = 'UPLOAD_FAILED';
  readonly fileName: string;

  constructor(
    fileName: string,
    message: string,
    options?: { status?: number; url?: string; retryable?: boolean; cause?: unknown }
  ) {
    super(`Upload of ${fileName} failed: ${message}`, options);
    this.fileName = fileName;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      fileName: this.fileName,
    };
  }
}

/**
 * A message listener threw or rejected
 */
export class ListenerError extends AppError {
  readonly code = 'LISTENER_ERROR' as const;
  readonly messageId: number | null;

  constructor(messageId: number | null, options?: { cause?: unknown }) {
    super(`Listener failed for message ${messageId ?? '(no id)'}: ${getErrorMessage(options?.cause)}`, options);
    this.messageId = messageId;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      messageId: this.messageId,
    };
  }
}

/**
 * start() called on a controller that was already started
 */
export class AlreadyStartedError extends AppError {
  readonly code = 'ALREADY_STARTED' as const;

  constructor(what: string) {
    super(`${what} has already been started`);
  }
}

/**
 * join() called on a controller that was never started
 */
export class NotStartedError extends AppError {
  readonly code = 'NOT_STARTED' as const;

  constructor(what: string) {
    super(`${what} has not been started`);
  }
}

/**
 * Upload path doesn't name a readable file
 */
export class FileNotFoundError extends AppError {
  readonly code = 'FILE_NOT_FOUND' as const;
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`File not found: ${path}`, options);
    this.path = path;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
    };
  }
}

/**
 * Operation stopped through its abort signal
 */
export class CancelledError extends AppError {
  readonly code = 'CANCELLED' as const;

  constructor(message: string = 'Operation cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Internal error - unexpected failure
 */
export class InternalError extends AppError {
  readonly code = 'INTERNAL_ERROR' as const;

  constructor(message: string = 'An internal error occurred', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Network failures, rate limiting and server errors may succeed on a later attempt
 */
export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Text of a caught value for messages and log data. Fireside errors and
 * other Error instances give their message; anything else is stringified.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error === undefined || error === null) return 'unknown error';
  return String(error);
}

/**
 * Check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new InternalError(error.message, { cause: error });
  }
  return new InternalError(String(error));
}
