export { classifyEvent, uploadLookupTarget, rawEventSchema, type RawEvent } from './classifier.js';
export { parseTimestamp } from './timestamp.js';
export { parseTweetBody, tweetUrl } from './tweet.js';
export { buildOutgoingMessage, type OutgoingMessage, type OutgoingMessageType } from './outgoing.js';
