/**
 * `fireside upload <room> <file>` - upload with a progress line; Ctrl+C cancels
 */

import type { ConfigOverrides } from '../config.js';
import { openSession } from '../session.js';
import { onInterrupt } from '../signals.js';
import { formatProgress } from '../output.js';

export async function uploadCommand(roomRef: string, path: string, options: ConfigOverrides): Promise<void> {
  const { client } = await openSession(options);
  const room = await client.resolveRoom(roomRef);

  const upload = room.upload(path, {
    onProgress: (sent, total) => {
      process.stderr.write(`\r${formatProgress(upload.fileName, sent, total)}`);
    },
    onFinished: (file) => {
      process.stderr.write('\n');
      console.log(`Uploaded ${file.name}: ${file.url}`);
    },
    onError: (error) => {
      process.stderr.write('\n');
      console.error(`Error: ${error.message}`);
    },
  });

  const interrupt = onInterrupt();
  interrupt.signal.addEventListener('abort', () => upload.stop(), { once: true });
  try {
    upload.start();
    const state = await upload.join();
    if (state === 'cancelled') {
      console.error(`Upload of ${upload.fileName} cancelled`);
    }
    if (state !== 'completed') {
      process.exitCode = 1;
    }
  } finally {
    interrupt.dispose();
  }
}
