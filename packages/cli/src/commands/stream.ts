/**
 * `fireside stream <room>` - print a room's messages until Ctrl+C
 */

import { getErrorMessage } from '@fireside/core';
import type { FiresideClient, Message } from '@fireside/client';
import type { ConfigOverrides } from '../config.js';
import { openSession } from '../session.js';
import { onInterrupt } from '../signals.js';
import { formatMessage } from '../output.js';
import { getLog } from '../log.js';

const log = getLog('cli');

export interface StreamCommandOptions extends ConfigOverrides {
  /** Poll instead of holding a live connection */
  poll?: boolean;
  /** Polling interval in milliseconds */
  interval?: number;
}

/**
 * Display name of a message's user. Falls back to the id when the lookup fails.
 */
export async function authorOf(client: Pick<FiresideClient, 'getUser'>, message: Message): Promise<string> {
  const user = message.user;
  if (!user) return 'system';
  if (user.name) return user.name;

  try {
    return (await client.getUser(user.id)).name;
  } catch (error) {
    log.debug(`Could not look up user ${user.id}`, { error: getErrorMessage(error) });
    return `user ${user.id}`;
  }
}

export async function streamCommand(roomRef: string, options: StreamCommandOptions): Promise<void> {
  const { client, config } = await openSession(options);
  const room = await client.resolveRoom(roomRef);

  const printed = new Set<Error>();
  const stream = room.stream({
    mode: options.poll ? 'polling' : 'live',
    pollIntervalMs: options.interval ?? config.pollIntervalMs,
    onError: (error) => {
      printed.add(error);
      console.error(`! ${error.message}`);
    },
  });
  stream.attach(async (message) => {
    console.log(formatMessage(message, await authorOf(client, message)));
  });

  const interrupt = onInterrupt();
  interrupt.signal.addEventListener('abort', () => stream.stop(), { once: true });
  try {
    try {
      await stream.start();
    } catch (error) {
      // a failed room join has already gone through onError
      if (error instanceof Error && printed.has(error)) {
        process.exitCode = 1;
        return;
      }
      throw error;
    }
    console.error(`Streaming ${room.name} (${stream.mode}), press Ctrl+C to stop`);
    await stream.join();
  } finally {
    interrupt.dispose();
  }
}
