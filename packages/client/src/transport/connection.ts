/**
 * HttpConnection
 *
 * Typed wrapper around native fetch() for the chat API.
 * Handles:
 *   - `.json` resource paths relative to the account URL
 *   - HTTP Basic credentials (API token or username/password)
 *   - Query parameter serialization
 *   - Envelope unwrapping (`{ "room": {...} }` → the room)
 *   - Per-request timeouts combined with the caller's AbortSignal
 *   - Error normalization (AuthenticationError, NotFoundError, TransportError)
 */

import {
  AuthenticationError,
  CancelledError,
  NotFoundError,
  REQUEST_TIMEOUT_MS,
  TransportError,
  USER_AGENT,
  ValidationError,
  cancelledBy,
  getErrorMessage,
} from '@fireside/core';
import { getLog } from '../log.js';

const log = getLog('Http');

// ============================================================================
// Types
// ============================================================================

export type Credentials = { token: string } | { username: string; password: string };

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type FetchFn = typeof fetch;

export interface HttpConnectionOptions {
  /** Account URL, e.g. https://team.example.com */
  baseUrl: string;
  credentials: Credentials;
  userAgent?: string;
  /** Timeout for non-streaming requests (default: 30000) */
  timeoutMs?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchFn;
}

export interface RequestOptions {
  signal?: AbortSignal;
  params?: QueryParams;
  /** JSON body */
  body?: unknown;
  /** Envelope key to unwrap from the response */
  key?: string;
}

export interface RawRequestOptions {
  signal: AbortSignal;
  headers?: Record<string, string>;
  body?: AsyncIterable<Uint8Array>;
  params?: QueryParams;
  /** null disables the timeout, for long-lived streams */
  timeoutMs?: number | null;
}

// ============================================================================
// Helpers
// ============================================================================

function buildQueryString(params?: QueryParams): string {
  if (!params) return '';

  const parts: string[] = [];
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    parts.push(`${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`);
  }

  return parts.length > 0 ? `?${parts.join('&')}` : '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function basicAuth(credentials: Credentials): string {
  const pair = 'token' in credentials ? `${credentials.token}:X` : `${credentials.username}:${credentials.password}`;
  return `Basic ${Buffer.from(pair, 'utf8').toString('base64')}`;
}

/**
 * Map a non-2xx response to the error the caller sees.
 */
export async function errorFromResponse(response: Response, url: string, path: string): Promise<Error> {
  if (response.status === 401) {
    return new AuthenticationError(`Authentication failed for ${path}`);
  }
  if (response.status === 404) {
    return new NotFoundError('Resource', path);
  }

  let detail = '';
  try {
    detail = (await response.text()).trim().slice(0, 200);
  } catch (error) {
    log.debug('Could not read error body', { url, error: getErrorMessage(error) });
  }
  const reason = detail ? `: ${detail}` : '';
  return new TransportError(`HTTP ${response.status} from ${path}${reason}`, { status: response.status, url });
}

// ============================================================================
// HttpConnection
// ============================================================================

export class HttpConnection {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpConnectionOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.authorization = basicAuth(options.credentials);
    this.userAgent = options.userAgent ?? USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Same endpoint, different credentials (after exchanging a password for a token).
   */
  withCredentials(credentials: Credentials): HttpConnection {
    return new HttpConnection({ ...this.options, credentials });
  }

  /**
   * Absolute URL for `path`. Relative paths get the `.json` suffix.
   */
  url(path: string, params?: QueryParams): string {
    if (/^https?:\/\//.test(path)) {
      return `${path}${buildQueryString(params)}`;
    }
    const resource = path.replace(/^\/+/, '');
    return `${this.baseUrl}/${resource}.json${buildQueryString(params)}`;
  }

  get(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('GET', path, options);
  }

  post(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('POST', path, options);
  }

  put(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('PUT', path, options);
  }

  delete(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('DELETE', path, options);
  }

  /**
   * JSON request. Resolves with the parsed body (unwrapped by `key`), or
   * null for an empty body.
   */
  async request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    const signal = options.signal ?? new AbortController().signal;
    const response = await this.send(method, path, { signal, headers, params: options.params }, body);
    const text = await response.text();
    if (!text.trim()) {
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(`Non-JSON response from ${path}`, { cause: error });
    }

    if (options.key === undefined) return data;
    if (!isRecord(data) || !(options.key in data)) {
      throw new ValidationError(`Response from ${path} has no "${options.key}"`, { field: options.key });
    }
    return data[options.key];
  }

  /**
   * Issue a request and return the successful Response unread. Streaming
   * bodies are sent half-duplex.
   */
  async raw(method: string, path: string, options: RawRequestOptions): Promise<Response> {
    return this.send(method, path, options, options.body);
  }

  private async send(
    method: string,
    path: string,
    options: RawRequestOptions,
    body: string | AsyncIterable<Uint8Array> | undefined
  ): Promise<Response> {
    const url = this.url(path, options.params);
    const timeoutMs = options.timeoutMs === undefined ? this.timeoutMs : options.timeoutMs;
    const signal =
      timeoutMs === null ? options.signal : AbortSignal.any([options.signal, AbortSignal.timeout(timeoutMs)]);

    const init: RequestInit = {
      method,
      headers: {
        Authorization: this.authorization,
        'User-Agent': this.userAgent,
        ...options.headers,
      },
      signal,
    };
    if (body !== undefined) {
      init.body = body;
      if (typeof body !== 'string') {
        init.duplex = 'half';
      }
    }

    log.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, init);
    } catch (error) {
      if (options.signal.aborted) {
        throw cancelledBy(options.signal);
      }
      if (error instanceof CancelledError || error instanceof TransportError) {
        throw error;
      }
      if (signal.aborted) {
        throw new TransportError(`Request to ${path} timed out after ${timeoutMs}ms`, { url, cause: error });
      }
      throw new TransportError(`Request to ${path} failed: ${getErrorMessage(error)}`, { url, cause: error });
    }

    if (!response.ok) {
      throw await errorFromResponse(response, url, path);
    }
    return response;
  }
}
