/**
 * Room - one chat room
 *
 * Membership and room administration go straight to the API; stream() and
 * upload() hand out controllers wired to the room's transport.
 */

import { z } from 'zod';
import type { Message, RoomInfo, UploadedFile, UserInfo } from '../types/index.js';
import type { HttpConnection } from '../transport/connection.js';
import type { RoomMembership, StreamTransport, UploadTransport } from '../transport/types.js';
import { parseResponse, roomSchema, uploadedFileSchema } from '../transport/schemas.js';
import { buildOutgoingMessage } from '../messages/outgoing.js';
import { classifyEvent } from '../messages/classifier.js';
import { StreamController, type StreamControllerOptions } from '../stream/controller.js';
import { UploadController, type UploadControllerOptions } from '../upload/controller.js';
import { getLog } from '../log.js';

const log = getLog('Room');

export type RoomStreamOptions = Omit<StreamControllerOptions, 'roomId' | 'transport' | 'membership'>;
export type RoomUploadOptions = Omit<UploadControllerOptions, 'roomId' | 'path' | 'transport'>;

export interface RoomContext {
  connection: HttpConnection;
  transport: StreamTransport & UploadTransport;
}

export class Room implements RoomMembership {
  private info: RoomInfo;

  constructor(
    private readonly context: RoomContext,
    info: RoomInfo
  ) {
    this.info = info;
  }

  get id(): number {
    return this.info.id;
  }

  get name(): string {
    return this.info.name;
  }

  get topic(): string | null {
    return this.info.topic;
  }

  get locked(): boolean {
    return this.info.locked;
  }

  /** Last loaded room data */
  get data(): RoomInfo {
    return this.info;
  }

  async reload(): Promise<RoomInfo> {
    const data = await this.context.connection.get(`room/${this.id}`, { key: 'room' });
    this.info = parseResponse(roomSchema, data, 'room');
    return this.info;
  }

  // ==========================================================================
  // Membership
  // ==========================================================================

  async join(): Promise<void> {
    await this.context.connection.post(`room/${this.id}/join`);
    log.debug(`Joined room ${this.name}`);
  }

  async leave(): Promise<void> {
    await this.context.connection.post(`room/${this.id}/leave`);
    log.debug(`Left room ${this.name}`);
  }

  async lock(): Promise<void> {
    await this.context.connection.post(`room/${this.id}/lock`);
    this.info = { ...this.info, locked: true };
  }

  async unlock(): Promise<void> {
    await this.context.connection.post(`room/${this.id}/unlock`);
    this.info = { ...this.info, locked: false };
  }

  async setName(name: string): Promise<void> {
    await this.context.connection.put(`room/${this.id}`, { body: { room: { name } } });
    await this.reload();
  }

  async setTopic(topic: string): Promise<void> {
    await this.context.connection.put(`room/${this.id}`, { body: { room: { topic } } });
    await this.reload();
  }

  // ==========================================================================
  // Messages
  // ==========================================================================

  /**
   * Post a message. Multi-line text goes out as a paste, status links as tweets.
   */
  async speak(text: string): Promise<Message> {
    const message = buildOutgoingMessage(text);
    const data = await this.context.connection.post(`room/${this.id}/speak`, {
      body: { message },
      key: 'message',
    });
    return classifyEvent(data);
  }

  async getUsers(): Promise<UserInfo[]> {
    const info = await this.reload();
    return info.users;
  }

  async getUploads(): Promise<UploadedFile[]> {
    const data = await this.context.connection.get(`room/${this.id}/uploads`, { key: 'uploads' });
    return parseResponse(z.array(uploadedFileSchema), data, 'uploads');
  }

  // ==========================================================================
  // Controllers
  // ==========================================================================

  /**
   * Message stream of this room. Live streams join the room on start.
   */
  stream(options: RoomStreamOptions = {}): StreamController {
    return new StreamController({
      ...options,
      roomId: this.id,
      transport: this.context.transport,
      membership: this,
    });
  }

  upload(path: string, options: RoomUploadOptions = {}): UploadController {
    return new UploadController({
      ...options,
      roomId: this.id,
      path,
      transport: this.context.transport,
    });
  }
}
