import { describe, it, expect } from 'vitest';
import { ValidationError } from '@fireside/core';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('reads a token configuration with defaults', () => {
    expect(loadConfig({ FIRESIDE_URL: 'https://chat.test', FIRESIDE_TOKEN: 'test-token' })).toEqual({
      url: 'https://chat.test',
      auth: { token: 'test-token' },
      logLevel: 'warn',
      logJson: false,
    });
  });

  it('builds the URL from a subdomain', () => {
    const config = loadConfig({ FIRESIDE_SUBDOMAIN: 'acme', FIRESIDE_TOKEN: 'test-token' });
    expect(config.url).toBe('https://acme.campfirenow.com');
  });

  it('reads username credentials without a password', () => {
    const config = loadConfig({ FIRESIDE_URL: 'https://chat.test', FIRESIDE_USERNAME: 'alice' });
    expect(config.auth).toEqual({ username: 'alice', password: null });
  });

  it('prefers a token over a username', () => {
    const config = loadConfig({
      FIRESIDE_URL: 'https://chat.test',
      FIRESIDE_TOKEN: 'test-token',
      FIRESIDE_USERNAME: 'alice',
      FIRESIDE_PASSWORD: 'test-secret',
    });
    expect(config.auth).toEqual({ token: 'test-token' });
  });

  it('reads the optional settings', () => {
    const config = loadConfig({
      FIRESIDE_URL: 'https://chat.test',
      FIRESIDE_TOKEN: 'test-token',
      FIRESIDE_STREAMING_URL: 'https://stream.chat.test',
      FIRESIDE_LOG_LEVEL: 'debug',
      FIRESIDE_LOG_JSON: '1',
      FIRESIDE_POLL_INTERVAL_MS: '2500',
    });

    expect(config).toEqual({
      url: 'https://chat.test',
      auth: { token: 'test-token' },
      streamingUrl: 'https://stream.chat.test',
      logLevel: 'debug',
      logJson: true,
      pollIntervalMs: 2500,
    });
  });

  it('lets flags override the environment', () => {
    const config = loadConfig(
      { FIRESIDE_URL: 'https://old.chat.test', FIRESIDE_TOKEN: 'test-token' },
      { url: 'https://chat.test', logLevel: 'info' }
    );
    expect(config.url).toBe('https://chat.test');
    expect(config.logLevel).toBe('info');
  });

  it('ignores empty and unrelated variables', () => {
    const config = loadConfig({
      FIRESIDE_URL: 'https://chat.test',
      FIRESIDE_TOKEN: 'test-token',
      FIRESIDE_STREAMING_URL: '  ',
      HOME: '/home/alice',
    });
    expect(config.streamingUrl).toBeUndefined();
  });

  it('lists every missing setting', () => {
    let error: unknown;
    try {
      loadConfig({});
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message:
        'Invalid configuration: FIRESIDE_URL: Set FIRESIDE_URL or FIRESIDE_SUBDOMAIN; ' +
        'FIRESIDE_TOKEN: Set FIRESIDE_TOKEN or FIRESIDE_USERNAME',
      errors: [
        { path: ['FIRESIDE_URL'], message: 'Set FIRESIDE_URL or FIRESIDE_SUBDOMAIN' },
        { path: ['FIRESIDE_TOKEN'], message: 'Set FIRESIDE_TOKEN or FIRESIDE_USERNAME' },
      ],
    });
  });

  it('rejects malformed values', () => {
    expect(() =>
      loadConfig({ FIRESIDE_URL: 'https://chat.test', FIRESIDE_TOKEN: 'test-token', FIRESIDE_LOG_LEVEL: 'loud' })
    ).toThrow(ValidationError);
    expect(() =>
      loadConfig({ FIRESIDE_URL: 'https://chat.test', FIRESIDE_TOKEN: 'test-token', FIRESIDE_POLL_INTERVAL_MS: '-5' })
    ).toThrow(ValidationError);
    expect(() => loadConfig({ FIRESIDE_URL: 'not a url', FIRESIDE_TOKEN: 'test-token' })).toThrow(ValidationError);
  });
});
