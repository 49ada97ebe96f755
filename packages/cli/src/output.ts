/**
 * Terminal formatting for messages, rooms and upload progress
 */

import type { Message, RoomInfo } from '@fireside/client';

function clock(timestamp: Date | null): string {
  return timestamp ? `[${timestamp.toISOString().slice(11, 19)}] ` : '';
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n');
}

/**
 * One message as printed by `fireside stream`. `author` is the display name
 * of the message's user.
 */
export function formatMessage(message: Message, author: string): string {
  const prefix = clock(message.timestamp);

  switch (message.kind) {
    case 'enter':
      return `${prefix}* ${author} entered the room`;
    case 'leave':
      return `${prefix}* ${author} left the room`;
    case 'text':
      return message.paste ? `${prefix}<${author}> pasted:\n${indent(message.body)}` : `${prefix}<${author}> ${message.body}`;
    case 'topic-change':
      return `${prefix}* ${author} changed the topic to: ${message.body}`;
    case 'tweet':
      return `${prefix}<${author}> @${message.tweet.author}: ${message.tweet.text} (${message.tweet.url})`;
    case 'upload':
      return `${prefix}* ${author} uploaded ${message.upload.fileName}: ${message.upload.url}`;
    case 'other':
      return `${prefix}* ${message.rawType ?? 'unknown'} event`;
  }
}

export function formatRoom(room: RoomInfo): string {
  const topic = room.topic ? ` - ${room.topic}` : '';
  const locked = room.locked ? ' (locked)' : '';
  return `${room.id}\t${room.name}${topic}${locked}`;
}

export function formatProgress(fileName: string, sent: number, total: number): string {
  const percent = total > 0 ? Math.floor((sent / total) * 100) : 100;
  return `${fileName}: ${sent}/${total} bytes (${percent}%)`;
}
