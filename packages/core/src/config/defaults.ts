/**
 * Fireside Default Configuration
 *
 * Named constants for all tunable engine values. Every one can be
 * overridden through the options of the controller that uses it.
 */

// ============================================================================
// Streaming
// ============================================================================

/** Messages buffered between fetcher and dispatcher before the fetcher blocks */
export const STREAM_QUEUE_CAPACITY = 100;

/** Transcript polling interval (ms) */
export const POLL_INTERVAL_MS = 1_000;

/** Message ids remembered for polling deduplication */
export const POLL_SEEN_CACHE_SIZE = 5_000;

// ============================================================================
// Live reconnect
// ============================================================================

/** First reconnect delay after a dropped live connection (ms) */
export const RECONNECT_INITIAL_DELAY_MS = 1_000;

/** Reconnect delay cap (ms) */
export const RECONNECT_MAX_DELAY_MS = 120_000;

export const RECONNECT_BACKOFF_MULTIPLIER = 2;

/** Consecutive failed connection attempts before giving up (null = never) */
export const RECONNECT_MAX_ATTEMPTS: number | null = null;

// ============================================================================
// Uploads
// ============================================================================

/** Bytes read from disk and sent per chunk */
export const UPLOAD_CHUNK_SIZE = 16 * 1024;

/** Retries of transient upload failures */
export const UPLOAD_MAX_RETRIES = 2;

// ============================================================================
// HTTP
// ============================================================================

/** Timeout for ordinary (non-streaming) requests (ms) */
export const REQUEST_TIMEOUT_MS = 30_000;

export const USER_AGENT = 'fireside/0.1.0';

/** Host serving `room/<id>/live.json` for every account */
export const STREAMING_URL = 'https://streaming.campfirenow.com';
