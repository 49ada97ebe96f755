/**
 * FiresideClient - entry point of the engine
 *
 * Usage:
 *   const client = await FiresideClient.connect({
 *     url: 'https://team.example.com',
 *     credentials: { token: process.env.FIRESIDE_TOKEN },
 *   });
 *   const room = await client.getRoomByName('Lobby');
 *   const stream = room.stream();
 */

import { z } from 'zod';
import { AuthenticationError, NotFoundError } from '@fireside/core';
import type { RoomInfo, UserInfo } from './types/index.js';
import { HttpConnection, type Credentials, type FetchFn } from './transport/connection.js';
import { HttpChatTransport } from './transport/http-transport.js';
import { parseResponse, roomSchema, userSchema } from './transport/schemas.js';
import { Room } from './rooms/room.js';
import { getLog } from './log.js';

const log = getLog('Client');

export interface FiresideClientOptions {
  /** Account URL */
  url: string;
  /** API token, or username and password to exchange for one */
  credentials: Credentials;
  /** Host of the live streaming endpoint (default: STREAMING_URL) */
  streamingUrl?: string;
  /** Timeout for ordinary requests */
  timeoutMs?: number;
  userAgent?: string;
  fetch?: FetchFn;
}

function byName(a: RoomInfo, b: RoomInfo): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export class FiresideClient {
  private readonly rooms = new Map<number, Room>();
  private readonly users = new Map<number, UserInfo>();

  private constructor(
    readonly connection: HttpConnection,
    readonly transport: HttpChatTransport,
    readonly me: UserInfo
  ) {
    this.users.set(me.id, me);
  }

  /**
   * Authenticate and return a ready client. Username/password credentials
   * are exchanged for the account's API token.
   */
  static async connect(options: FiresideClientOptions): Promise<FiresideClient> {
    let connection = new HttpConnection({
      baseUrl: options.url,
      credentials: options.credentials,
      timeoutMs: options.timeoutMs,
      userAgent: options.userAgent,
      fetch: options.fetch,
    });

    const data = await connection.get('users/me', { key: 'user' });
    const me = parseResponse(userSchema, data, 'user');

    if ('username' in options.credentials) {
      if (!me.apiAuthToken) {
        throw new AuthenticationError('Server returned no API token for this user');
      }
      connection = connection.withCredentials({ token: me.apiAuthToken });
    }

    log.info(`Connected to ${connection.baseUrl} as ${me.name}`);
    const transport = new HttpChatTransport(connection, { streamingUrl: options.streamingUrl });
    return new FiresideClient(connection, transport, me);
  }

  /**
   * All rooms, sorted by name.
   */
  async getRooms(): Promise<RoomInfo[]> {
    const data = await this.connection.get('rooms', { key: 'rooms' });
    const rooms = parseResponse(z.array(roomSchema), data, 'rooms');
    return [...rooms].sort(byName);
  }

  async getRoom(id: number): Promise<Room> {
    const cached = this.rooms.get(id);
    if (cached) return cached;

    const data = await this.connection.get(`room/${id}`, { key: 'room' });
    const room = new Room(
      { connection: this.connection, transport: this.transport },
      parseResponse(roomSchema, data, 'room')
    );
    this.rooms.set(id, room);
    return room;
  }

  /**
   * Room by name, ignoring case. Throws NotFoundError when none matches.
   */
  async getRoomByName(name: string): Promise<Room> {
    const wanted = name.toLowerCase();
    const match = (await this.getRooms()).find((room) => room.name.toLowerCase() === wanted);
    if (!match) {
      throw new NotFoundError('Room', name);
    }
    return this.getRoom(match.id);
  }

  /**
   * Room by numeric id or by name.
   */
  resolveRoom(reference: string): Promise<Room> {
    return /^\d+$/.test(reference) ? this.getRoom(Number(reference)) : this.getRoomByName(reference);
  }

  async getUser(id: number): Promise<UserInfo> {
    const cached = this.users.get(id);
    if (cached) return cached;

    const data = await this.connection.get(`users/${id}`, { key: 'user' });
    const user = parseResponse(userSchema, data, 'user');
    this.users.set(id, user);
    return user;
  }

  async highlightMessage(messageId: number): Promise<void> {
    await this.connection.post(`messages/${messageId}/star`);
  }

  async removeHighlight(messageId: number): Promise<void> {
    await this.connection.delete(`messages/${messageId}/star`);
  }
}
