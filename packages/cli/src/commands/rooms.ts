/**
 * `fireside rooms` - list the account's rooms
 */

import type { ConfigOverrides } from '../config.js';
import { openSession } from '../session.js';
import { formatRoom } from '../output.js';

export async function roomsCommand(options: ConfigOverrides): Promise<void> {
  const { client } = await openSession(options);
  const rooms = await client.getRooms();

  if (rooms.length === 0) {
    console.log('No rooms found.');
    return;
  }
  for (const room of rooms) {
    console.log(formatRoom(room));
  }
}
