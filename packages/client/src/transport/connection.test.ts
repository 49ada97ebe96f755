import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

vi.mock('../log.js', () => ({
  getLog: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() }),
}));

import {
  AuthenticationError,
  CancelledError,
  NotFoundError,
  TransportError,
  ValidationError,
} from '@fireside/core';
import { HttpConnection, type FetchFn } from './connection.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('HttpConnection', () => {
  let fetchMock: Mock<FetchFn>;
  let connection: HttpConnection;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>(async () => jsonResponse({}));
    connection = new HttpConnection({
      baseUrl: 'https://chat.test/',
      credentials: { token: 'test-token' },
      fetch: fetchMock,
    });
  });

  function lastCall(): { url: unknown; init: RequestInit | undefined } {
    const call = fetchMock.mock.calls.at(-1);
    return { url: call?.[0], init: call?.[1] };
  }

  // ==========================================================================
  // URLs
  // ==========================================================================

  describe('url', () => {
    it('appends .json to resource paths', () => {
      expect(connection.url('rooms')).toBe('https://chat.test/rooms.json');
      expect(connection.url('/room/1/recent')).toBe('https://chat.test/room/1/recent.json');
    });

    it('serializes defined query params', () => {
      expect(connection.url('room/1/recent', { since_message_id: 5, limit: undefined })).toBe(
        'https://chat.test/room/1/recent.json?since_message_id=5'
      );
    });

    it('leaves absolute URLs alone', () => {
      expect(connection.url('https://stream.test/room/1/live.json')).toBe('https://stream.test/room/1/live.json');
    });
  });

  // ==========================================================================
  // Requests
  // ==========================================================================

  describe('request', () => {
    it('sends token credentials as basic auth', async () => {
      await connection.get('rooms');

      const { url, init } = lastCall();
      const headers = new Headers(init?.headers);
      expect(url).toBe('https://chat.test/rooms.json');
      expect(init?.method).toBe('GET');
      expect(headers.get('Authorization')).toBe('Basic dGVzdC10b2tlbjpY');
      expect(headers.get('User-Agent')).toBe('fireside/0.1.0');
      expect(headers.get('Accept')).toBe('application/json');
    });

    it('sends username and password as basic auth', async () => {
      const withPassword = connection.withCredentials({ username: 'alice', password: 'test-secret' });
      await withPassword.get('users/me');

      const headers = new Headers(lastCall().init?.headers);
      expect(headers.get('Authorization')).toBe('Basic YWxpY2U6dGVzdC1zZWNyZXQ=');
    });

    it('serializes a JSON body', async () => {
      await connection.put('room/1', { body: { room: { topic: 'Release' } } });

      const { init } = lastCall();
      expect(init?.method).toBe('PUT');
      expect(init?.body).toBe('{"room":{"topic":"Release"}}');
      expect(new Headers(init?.headers).get('Content-Type')).toBe('application/json');
    });

    it('unwraps the envelope key', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ room: { id: 1, name: 'Lobby' } }));
      await expect(connection.get('room/1', { key: 'room' })).resolves.toEqual({ id: 1, name: 'Lobby' });
    });

    it('rejects a response without the envelope key', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ rooms: [] }));
      await expect(connection.get('room/1', { key: 'room' })).rejects.toThrow(
        new ValidationError('Response from room/1 has no "room"')
      );
    });

    it('resolves null for an empty body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 200 }));
      await expect(connection.post('room/1/join')).resolves.toBeNull();
    });

    it('rejects a body that is not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));
      await expect(connection.get('rooms')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  // ==========================================================================
  // Errors
  // ==========================================================================

  describe('errors', () => {
    it('maps 401 to AuthenticationError', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 401 }));
      const error: unknown = await connection.get('rooms').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ message: 'Authentication failed for rooms' });
    });

    it('maps 404 to NotFoundError', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 404 }));
      await expect(connection.get('room/99')).rejects.toThrow(new NotFoundError('Resource', 'room/99'));
    });

    it('maps other statuses to TransportError with the body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('  busy  ', { status: 503 }));
      const error: unknown = await connection.get('rooms').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        message: 'HTTP 503 from rooms: busy',
        status: 503,
        url: 'https://chat.test/rooms.json',
        retryable: true,
      });
    });

    it('marks client errors as not retryable', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 422 }));
      await expect(connection.get('rooms')).rejects.toMatchObject({
        message: 'HTTP 422 from rooms',
        retryable: false,
      });
    });

    it('wraps network failures in TransportError', async () => {
      fetchMock.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      await expect(connection.get('rooms')).rejects.toThrow(new TransportError('Request to rooms failed: ECONNREFUSED'));
    });

    it('reports a timeout', async () => {
      const slow = new HttpConnection({
        baseUrl: 'https://chat.test',
        credentials: { token: 'test-token' },
        timeoutMs: 5,
        fetch: (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      });

      await expect(slow.get('rooms')).rejects.toThrow(new TransportError('Request to rooms timed out after 5ms'));
    });

    it('throws CancelledError when the caller aborts', async () => {
      const controller = new AbortController();
      controller.abort();
      fetchMock.mockRejectedValueOnce(new Error('aborted'));

      await expect(connection.get('rooms', { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    });
  });
});
