/**
 * Command-line interface definition
 */

import { Command, InvalidArgumentError } from 'commander';
import { AppError, ValidationError, getErrorMessage } from '@fireside/core';
import type { ConfigOverrides } from './config.js';
import { roomsCommand, sayCommand, streamCommand, uploadCommand, type StreamCommandOptions } from './commands/index.js';

export function parseInterval(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Must be a positive number of milliseconds.');
  }
  return ms;
}

/**
 * Print a failed command's error to stderr.
 */
export function reportError(error: unknown): void {
  if (error instanceof ValidationError && error.errors && error.errors.length > 0) {
    console.error('Error: invalid configuration');
    for (const issue of error.errors) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    return;
  }
  if (error instanceof AppError) {
    console.error(`Error: ${error.message}`);
    return;
  }
  console.error(`Unexpected error: ${getErrorMessage(error)}`);
}

function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      reportError(error);
      process.exitCode = 1;
    }
  };
}

export function createProgram(): Command {
  const program = new Command();
  const globals = () => program.opts<ConfigOverrides>();

  program
    .name('fireside')
    .description('Stream, post to and upload files to chat rooms')
    .version('0.1.0')
    .option('--url <url>', 'Account URL (or FIRESIDE_URL)')
    .option('--token <token>', 'API token (or FIRESIDE_TOKEN)')
    .option('--username <name>', 'Log in with a username instead of a token (or FIRESIDE_USERNAME)')
    .option('--streaming-url <url>', 'Live streaming host (or FIRESIDE_STREAMING_URL)')
    .option('--log-level <level>', 'debug, info, warn or error (or FIRESIDE_LOG_LEVEL)');

  program
    .command('rooms')
    .description('List rooms')
    .action(run(() => roomsCommand(globals())));

  program
    .command('stream <room>')
    .description('Print messages of a room until Ctrl+C')
    .option('--poll', 'Poll for messages instead of holding a live connection')
    .option('--interval <ms>', 'Polling interval in milliseconds', parseInterval)
    .action(
      run((room: string, options: StreamCommandOptions) => streamCommand(room, { ...globals(), ...options }))
    );

  program
    .command('say <room> <text...>')
    .description('Post a message')
    .action(run((room: string, text: string[]) => sayCommand(room, text, globals())));

  program
    .command('upload <room> <file>')
    .description('Upload a file; Ctrl+C cancels')
    .action(run((room: string, file: string) => uploadCommand(room, file, globals())));

  return program;
}
