/**
 * Response schemas of the chat API
 *
 * Remote resources are validated with zod and mapped to the engine's
 * camelCase types.
 */

import { z } from 'zod';
import { ValidationError } from '@fireside/core';
import type { RoomInfo, UploadedFile, UserInfo } from '../types/index.js';
import { parseTimestamp } from '../messages/timestamp.js';

export const userSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    email_address: z.string().nullish(),
    admin: z.boolean().nullish(),
    avatar_url: z.string().nullish(),
    api_auth_token: z.string().nullish(),
  })
  .transform(
    (user): UserInfo => ({
      id: user.id,
      name: user.name,
      ...(user.email_address ? { emailAddress: user.email_address } : {}),
      ...(typeof user.admin === 'boolean' ? { admin: user.admin } : {}),
      ...(user.avatar_url ? { avatarUrl: user.avatar_url } : {}),
      ...(user.api_auth_token ? { apiAuthToken: user.api_auth_token } : {}),
    })
  );

export const roomSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    topic: z.string().nullish(),
    membership_limit: z.number().int().nullish(),
    locked: z.boolean().nullish(),
    full: z.boolean().nullish(),
    open_to_guests: z.boolean().nullish(),
    users: z.array(userSchema).nullish(),
    created_at: z.unknown(),
    updated_at: z.unknown(),
  })
  .transform(
    (room): RoomInfo => ({
      id: room.id,
      name: room.name,
      topic: room.topic ?? null,
      locked: room.locked ?? false,
      users: room.users ?? [],
      createdAt: parseTimestamp(room.created_at),
      updatedAt: parseTimestamp(room.updated_at),
      ...(typeof room.membership_limit === 'number' ? { membershipLimit: room.membership_limit } : {}),
      ...(typeof room.full === 'boolean' ? { full: room.full } : {}),
      ...(typeof room.open_to_guests === 'boolean' ? { openToGuests: room.open_to_guests } : {}),
    })
  );

export const uploadedFileSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    full_url: z.string().optional(),
    url: z.string().optional(),
    content_type: z.string().nullish(),
    byte_size: z.number().int().nullish(),
    room_id: z.number().int().nullish(),
    user_id: z.number().int().nullish(),
    created_at: z.unknown(),
  })
  .refine((upload) => upload.full_url !== undefined || upload.url !== undefined, {
    message: 'Upload has no url',
    path: ['full_url'],
  })
  .transform(
    (upload): UploadedFile => ({
      id: upload.id,
      name: upload.name,
      url: upload.full_url ?? upload.url ?? '',
      createdAt: parseTimestamp(upload.created_at),
      ...(upload.content_type ? { contentType: upload.content_type } : {}),
      ...(typeof upload.byte_size === 'number' ? { byteSize: upload.byte_size } : {}),
      ...(typeof upload.room_id === 'number' ? { roomId: upload.room_id } : {}),
      ...(typeof upload.user_id === 'number' ? { userId: upload.user_id } : {}),
    })
  );

export const eventListSchema = z.array(z.unknown());

/**
 * Validate a response, throwing ValidationError with every failing path.
 */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      path: issue.path.map(String),
      message: issue.message,
    }));
    const summary = errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
    throw new ValidationError(`Invalid ${what} response: ${summary}`, { errors });
  }
  return result.data;
}
