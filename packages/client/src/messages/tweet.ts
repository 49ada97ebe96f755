/**
 * Tweet body parsing
 *
 * Tweets arrive as `<text> -- @<author>, <url>` on the live stream and as a
 * YAML-like block on transcripts:
 *
 *   ---
 *   :author_username: someone
 *   :message: "hello"
 *   :id: 1234
 */

import type { TweetPayload } from '../types/index.js';

const INLINE_FORMAT = /^(.+)\s+--\s+@([^,]+),\s*(.+)$/;
const BLOCK_LINE = /^:([^:]+):\s*(.*)$/;

export function tweetUrl(author: string, id: string): string {
  return `http://twitter.com/${author}/status/${id}`;
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/**
 * Parse a tweet body in either format. Returns null when neither matches.
 */
export function parseTweetBody(body: string): TweetPayload | null {
  const inline = INLINE_FORMAT.exec(body);
  if (inline) {
    const [, text = '', author = '', url = ''] = inline;
    return { text: text.trim(), author: author.trim(), url: url.trim() };
  }

  if (!body.startsWith('---')) return null;

  const fields = new Map<string, string>();
  for (const line of body.split('\n').slice(1)) {
    const match = BLOCK_LINE.exec(line.trimEnd());
    if (match?.[1] && match[2]) {
      fields.set(match[1], unquote(match[2]));
    }
  }

  const author = fields.get('author_username');
  const text = fields.get('message');
  const id = fields.get('id');
  if (!author || text === undefined || !id) return null;

  return { author, text, url: tweetUrl(author, id) };
}
