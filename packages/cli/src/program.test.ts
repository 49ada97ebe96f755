import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

const { commands } = vi.hoisted(() => ({
  commands: {
    roomsCommand: vi.fn(),
    sayCommand: vi.fn(),
    streamCommand: vi.fn(),
    uploadCommand: vi.fn(),
  },
}));

vi.mock('./commands/index.js', () => commands);

import { InvalidArgumentError } from 'commander';
import { AuthenticationError, ValidationError } from '@fireside/core';
import { createProgram, parseInterval, reportError } from './program.js';

function parse(...args: string[]) {
  return createProgram().parseAsync(['node', 'fireside', ...args]);
}

describe('createProgram', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.clearAllMocks();
    process.exitCode = undefined;
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('runs rooms with the global flags', async () => {
    await parse('--url', 'https://chat.test', '--token', 'test-token', 'rooms');
    expect(commands.roomsCommand).toHaveBeenCalledWith({ url: 'https://chat.test', token: 'test-token' });
  });

  it('passes stream flags', async () => {
    await parse('--log-level', 'debug', 'stream', 'Lobby', '--poll', '--interval', '500');
    expect(commands.streamCommand).toHaveBeenCalledWith('Lobby', { logLevel: 'debug', poll: true, interval: 500 });
  });

  it('collects the words of say', async () => {
    await parse('say', '42', 'ship', 'it');
    expect(commands.sayCommand).toHaveBeenCalledWith('42', ['ship', 'it'], {});
  });

  it('passes the upload file', async () => {
    await parse('--streaming-url', 'https://stream.chat.test', 'upload', 'Lobby', './notes.txt');
    expect(commands.uploadCommand).toHaveBeenCalledWith('Lobby', './notes.txt', {
      streamingUrl: 'https://stream.chat.test',
    });
  });

  it('reports a failing command and sets the exit code', async () => {
    commands.roomsCommand.mockRejectedValue(new AuthenticationError('Authentication failed for users/me'));

    await parse('rooms');

    expect(errorSpy).toHaveBeenCalledWith('Error: Authentication failed for users/me');
    expect(process.exitCode).toBe(1);
  });
});

describe('parseInterval', () => {
  it('accepts positive integers', () => {
    expect(parseInterval('250')).toBe(250);
  });

  it('rejects anything else', () => {
    expect(() => parseInterval('0')).toThrow(InvalidArgumentError);
    expect(() => parseInterval('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseInterval('soon')).toThrow(InvalidArgumentError);
  });
});

describe('reportError', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('lists configuration problems', () => {
    reportError(
      new ValidationError('Invalid configuration', {
        errors: [{ path: ['FIRESIDE_URL'], message: 'Set FIRESIDE_URL or FIRESIDE_SUBDOMAIN' }],
      })
    );

    expect(errorSpy.mock.calls).toEqual([
      ['Error: invalid configuration'],
      ['  FIRESIDE_URL: Set FIRESIDE_URL or FIRESIDE_SUBDOMAIN'],
    ]);
  });

  it('labels unexpected errors', () => {
    reportError(new TypeError('x is undefined'));
    expect(errorSpy).toHaveBeenCalledWith('Unexpected error: x is undefined');
  });
});
