/**
 * Outgoing message construction
 */

export type OutgoingMessageType = 'TextMessage' | 'PasteMessage' | 'TweetMessage' | 'SoundMessage';

export interface OutgoingMessage {
  type: OutgoingMessageType;
  body: string;
}

const TWEET_URL = /^https?:\/\/(www\.)?twitter\.com\/([^/]+)\/status\/(\d+)/;

/**
 * Pick the message type the server expects for `text`:
 * multi-line text is a paste, a status link is a tweet.
 */
export function buildOutgoingMessage(text: string): OutgoingMessage {
  if (text.includes('\n')) {
    return { type: 'PasteMessage', body: text };
  }
  if (TWEET_URL.test(text)) {
    return { type: 'TweetMessage', body: text };
  }
  return { type: 'TextMessage', body: text };
}
