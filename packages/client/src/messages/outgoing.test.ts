import { describe, it, expect } from 'vitest';
import { buildOutgoingMessage } from './outgoing.js';

describe('buildOutgoingMessage', () => {
  it('sends single lines as text', () => {
    expect(buildOutgoingMessage('hello')).toEqual({ type: 'TextMessage', body: 'hello' });
  });

  it('sends multi-line text as a paste', () => {
    expect(buildOutgoingMessage('a\nb')).toEqual({ type: 'PasteMessage', body: 'a\nb' });
  });

  it('sends status links as tweets', () => {
    expect(buildOutgoingMessage('https://www.twitter.com/someone/status/123').type).toBe('TweetMessage');
    expect(buildOutgoingMessage('http://twitter.com/someone/status/123 nice').type).toBe('TweetMessage');
  });

  it('does not treat other links as tweets', () => {
    expect(buildOutgoingMessage('https://twitter.com/someone').type).toBe('TextMessage');
  });
});
