/**
 * Message classifier
 *
 * Turns one decoded server event into a typed, frozen Message. Total:
 * unknown type tags and malformed payloads become `other` with the raw
 * event preserved, and nothing here throws.
 */

import { z } from 'zod';
import type { Message, MessageUser, TweetPayload, UploadPayload } from '../types/index.js';
import { parseTimestamp } from './timestamp.js';
import { parseTweetBody, tweetUrl } from './tweet.js';

// ============================================================================
// Raw event schemas
// ============================================================================

const optionalInt = z.number().int().nullish().catch(null);

/**
 * Base fields are read leniently: a wrong-typed id becomes null rather than
 * failing the whole event.
 */
export const rawEventSchema = z
  .object({
    id: optionalInt,
    type: z.string().optional().catch(undefined),
    body: z.string().nullish().catch(null),
    user_id: optionalInt,
    room_id: optionalInt,
    created_at: z.unknown(),
    user: z.object({ id: z.number().int(), name: z.string().optional() }).optional().catch(undefined),
    tweet: z.unknown(),
    upload: z.unknown(),
  })
  .passthrough();

export type RawEvent = z.infer<typeof rawEventSchema>;

const structuredTweetSchema = z.union([
  z.object({
    author_username: z.string().min(1),
    message: z.string(),
    id: z.union([z.string().min(1), z.number()]),
  }),
  z.object({
    author: z.string().min(1),
    text: z.string(),
    url: z.string().min(1),
  }),
]);

const rawUploadSchema = z.object({
  name: z.string().min(1).optional(),
  full_url: z.string().min(1).optional(),
  url: z.string().min(1).optional(),
});

// ============================================================================
// Classification
// ============================================================================

type Base = Pick<Message, 'id' | 'timestamp' | 'roomId' | 'user'>;

function baseFields(event: RawEvent): Base {
  const base: { -readonly [K in keyof Base]: Base[K] } = {
    id: event.id ?? null,
    timestamp: parseTimestamp(event.created_at),
    roomId: event.room_id ?? null,
  };

  const userId = event.user_id ?? event.user?.id;
  if (userId !== undefined && userId !== null) {
    const user: MessageUser = { id: userId };
    if (event.user && event.user.id === userId && event.user.name !== undefined) {
      user.name = event.user.name;
    }
    base.user = Object.freeze(user);
  }

  return base;
}

function other(raw: unknown, base: Base, rawType?: string): Message {
  return Object.freeze({
    ...base,
    kind: 'other' as const,
    ...(rawType !== undefined ? { rawType } : {}),
    raw,
  });
}

function readTweet(event: RawEvent): TweetPayload | null {
  const structured = structuredTweetSchema.safeParse(event.tweet);
  if (structured.success) {
    const tweet = structured.data;
    if ('author_username' in tweet) {
      return {
        author: tweet.author_username,
        text: tweet.message,
        url: tweetUrl(tweet.author_username, String(tweet.id)),
      };
    }
    return { author: tweet.author, text: tweet.text, url: tweet.url };
  }

  return typeof event.body === 'string' ? parseTweetBody(event.body) : null;
}

function readUpload(event: RawEvent): UploadPayload | null {
  const parsed = rawUploadSchema.safeParse(event.upload);
  if (!parsed.success) return null;

  const fileName = parsed.data.name ?? event.body ?? undefined;
  const url = parsed.data.full_url ?? parsed.data.url;
  if (!fileName || !url) return null;

  return { fileName, url };
}

/**
 * Classify a decoded server event.
 */
export function classifyEvent(raw: unknown): Message {
  const parsed = rawEventSchema.safeParse(raw);
  if (!parsed.success) {
    return other(raw, { id: null, timestamp: null, roomId: null });
  }

  const event = parsed.data;
  const base = baseFields(event);
  const body = event.body;

  switch (event.type) {
    case 'EnterMessage':
      return Object.freeze({ ...base, kind: 'enter' as const });

    case 'LeaveMessage':
    case 'KickMessage':
      return Object.freeze({ ...base, kind: 'leave' as const });

    case 'TextMessage':
    case 'PasteMessage':
      if (typeof body !== 'string') break;
      return Object.freeze({
        ...base,
        kind: 'text' as const,
        body,
        paste: event.type === 'PasteMessage',
      });

    case 'TopicChangeMessage':
      if (typeof body !== 'string') break;
      return Object.freeze({ ...base, kind: 'topic-change' as const, body });

    case 'TweetMessage': {
      const tweet = readTweet(event);
      if (!tweet) break;
      return Object.freeze({ ...base, kind: 'tweet' as const, tweet: Object.freeze(tweet) });
    }

    case 'UploadMessage': {
      const upload = readUpload(event);
      if (!upload) break;
      return Object.freeze({ ...base, kind: 'upload' as const, upload: Object.freeze(upload) });
    }
  }

  return other(raw, base, event.type);
}

/**
 * Upload events carry only the file name; the stored file is fetched
 * separately. Returns the message to look up, or null when the event
 * needs no lookup.
 */
export function uploadLookupTarget(raw: unknown): { messageId: number; roomId: number | null } | null {
  const parsed = rawEventSchema.safeParse(raw);
  if (!parsed.success) return null;

  const event = parsed.data;
  if (event.type !== 'UploadMessage' || typeof event.id !== 'number') return null;
  if (event.upload !== undefined && event.upload !== null) return null;

  return { messageId: event.id, roomId: event.room_id ?? null };
}
