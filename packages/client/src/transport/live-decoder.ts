/**
 * Live stream decoding
 *
 * The streaming endpoint sends one JSON event per line, separated by `\r`
 * (sometimes `\r\n`), with bare whitespace as keep-alive. Events may be
 * split across network chunks.
 */

import { getErrorMessage } from '@fireside/core';
import { getLog } from '../log.js';

const log = getLog('LiveDecoder');

const SEPARATOR = /[\r\n]/;

function* decodeLines(lines: readonly string[]): Generator<unknown, void, undefined> {
  for (const line of lines) {
    const text = line.trim();
    if (!text) continue;

    let event: unknown;
    try {
      event = JSON.parse(text);
    } catch (error) {
      log.warn('Skipping undecodable stream line', { line: text.slice(0, 200), error: getErrorMessage(error) });
      continue;
    }
    yield event;
  }
}

/**
 * Yield each decoded event of a chunked live body, in order.
 */
export async function* decodeLiveStream(body: AsyncIterable<Uint8Array>): AsyncGenerator<unknown, void, undefined> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const chunk of body) {
    buffer += decoder.decode(chunk, { stream: true });

    const lines = buffer.split(SEPARATOR);
    buffer = lines.pop() ?? '';
    yield* decodeLines(lines);
  }

  buffer += decoder.decode();
  yield* decodeLines([buffer]);
}
