/**
 * `fireside say <room> <text...>` - post a message
 */

import type { ConfigOverrides } from '../config.js';
import { openSession } from '../session.js';

export async function sayCommand(roomRef: string, words: string[], options: ConfigOverrides): Promise<void> {
  const { client } = await openSession(options);
  const room = await client.resolveRoom(roomRef);
  const message = await room.speak(words.join(' '));

  console.log(`Sent message ${message.id ?? '(no id)'} to ${room.name}`);
}
