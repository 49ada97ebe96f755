/**
 * Shared test helpers for @fireside/client
 *
 * In-process stand-ins for the collaborator interfaces, so engine tests
 * never touch the network.
 */

import { vi, type Mock } from 'vitest';
import { abortable } from '@fireside/core';
import type { RoomMembership, StreamTransport, UploadRequest, UploadTransport } from './transport/types.js';
import type { UploadedFile } from './types/index.js';

// ---------------------------------------------------------------------------
// Raw events
// ---------------------------------------------------------------------------

let nextEventId = 1000;

export function rawEvent(type: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: nextEventId++,
    type,
    room_id: 1,
    user_id: 7,
    body: null,
    created_at: '2024/05/01 12:00:00 +0000',
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Stream transport
// ---------------------------------------------------------------------------

export type LiveConnection = (signal: AbortSignal) => AsyncIterable<unknown>;

/** Resolves never; rejects with CancelledError once `signal` fires */
export function waitForAbort(signal: AbortSignal): Promise<never> {
  return abortable(new Promise<never>(() => {}), signal);
}

/**
 * Scripted live connection: yields `events`, then hangs until aborted,
 * ends (server close), or throws the given error.
 */
export function liveConnection(events: unknown[], end: 'hang' | 'close' | Error = 'hang'): LiveConnection {
  return async function* (signal: AbortSignal) {
    for (const event of events) {
      yield event;
    }
    if (end === 'close') return;
    if (end instanceof Error) throw end;
    await waitForAbort(signal);
  };
}

export class FakeStreamTransport implements StreamTransport {
  /** Connections handed out in order; once used up, connections hang */
  readonly connections: LiveConnection[] = [];
  /** Transcript responses handed out in order; the last one repeats */
  readonly transcripts: unknown[][] = [];
  /** Answers getRecentMessages */
  recent: (sinceId: number) => unknown[] | Promise<unknown[]> = () => [];
  readonly uploadDetails = new Map<number, unknown>();

  opened = 0;
  readonly recentCalls: number[] = [];
  transcriptCalls = 0;

  openLiveStream(_roomId: number, signal: AbortSignal): AsyncIterable<unknown> {
    const connection = this.connections[this.opened] ?? liveConnection([]);
    this.opened++;
    return connection(signal);
  }

  async getTranscript(): Promise<unknown[]> {
    const response = this.transcripts[Math.min(this.transcriptCalls, this.transcripts.length - 1)] ?? [];
    this.transcriptCalls++;
    return response;
  }

  async getRecentMessages(_roomId: number, sinceId: number): Promise<unknown[]> {
    this.recentCalls.push(sinceId);
    return this.recent(sinceId);
  }

  async getUploadDetails(_roomId: number, messageId: number): Promise<unknown> {
    if (!this.uploadDetails.has(messageId)) {
      throw new Error(`No upload for message ${messageId}`);
    }
    return this.uploadDetails.get(messageId);
  }
}

export interface FakeMembership extends RoomMembership {
  join: Mock<() => Promise<void>>;
  leave: Mock<() => Promise<void>>;
}

export function fakeMembership(join: () => Promise<void> = async () => {}): FakeMembership {
  return {
    join: vi.fn(join),
    leave: vi.fn(async () => {}),
  };
}

// ---------------------------------------------------------------------------
// Upload transport
// ---------------------------------------------------------------------------

export function uploadedFile(overrides: Partial<UploadedFile> = {}): UploadedFile {
  return {
    id: 55,
    name: 'notes.txt',
    url: 'https://chat.test/uploads/notes.txt',
    createdAt: null,
    ...overrides,
  };
}

export type UploadBehaviour = (request: UploadRequest, signal: AbortSignal, attempt: number) => Promise<UploadedFile>;

/** Pull the whole body; resolves with the byte count */
export async function consumeBody(request: UploadRequest): Promise<number> {
  let received = 0;
  for await (const chunk of request.body) {
    received += chunk.length;
  }
  return received;
}

export class FakeUploadTransport implements UploadTransport {
  readonly requests: UploadRequest[] = [];

  constructor(
    private readonly behaviour: UploadBehaviour = async (request) => {
      await consumeBody(request);
      return uploadedFile({ name: request.fileName });
    }
  ) {}

  uploadFile(_roomId: number, request: UploadRequest, signal: AbortSignal): Promise<UploadedFile> {
    const attempt = this.requests.length;
    this.requests.push(request);
    return this.behaviour(request, signal, attempt);
  }
}
