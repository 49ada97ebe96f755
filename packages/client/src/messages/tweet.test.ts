import { describe, it, expect } from 'vitest';
import { parseTweetBody } from './tweet.js';

describe('parseTweetBody', () => {
  it('parses the inline format', () => {
    expect(parseTweetBody('Coffee time -- @barista, http://twitter.com/barista/status/77')).toEqual({
      text: 'Coffee time',
      author: 'barista',
      url: 'http://twitter.com/barista/status/77',
    });
  });

  it('keeps separators inside the tweet text', () => {
    expect(parseTweetBody('a -- b -- @c, http://t/1')).toEqual({ text: 'a -- b', author: 'c', url: 'http://t/1' });
  });

  it('parses the block format and ignores unknown keys', () => {
    const body = [
      '---',
      ':author_avatar_url: http://img.test/a.png',
      ':author_username: barista',
      ':message: Coffee time',
      ':id: 77',
    ].join('\n');
    expect(parseTweetBody(body)).toEqual({
      author: 'barista',
      text: 'Coffee time',
      url: 'http://twitter.com/barista/status/77',
    });
  });

  it('requires author, message and id in a block', () => {
    expect(parseTweetBody('---\n:author_username: barista\n:id: 77')).toBeNull();
  });

  it('returns null for plain text', () => {
    expect(parseTweetBody('just words')).toBeNull();
  });
});
