/**
 * LogService Implementation
 *
 * Structured logging with two modes:
 * - Development: Human-readable output with module prefix
 * - Production: JSON structured output, one record per line
 *
 * Records go to stderr by default so that a CLI can keep stdout for
 * chat output.
 *
 * Usage:
 *   const log = createLogService({ level: 'info' });
 *   log.info('Connected', { roomId: 42 });
 *
 *   const streamLog = log.child('Stream');
 *   streamLog.info('Reconnecting');
 *   // Dev:  [Stream] Reconnecting
 *   // Prod: {"level":"info","ts":"...","module":"Stream","msg":"Reconnecting"}
 */

import { inspect } from 'node:util';
import type { ILogService, LogLevel } from './log-service.js';

export type LogWriter = (level: LogLevel, line: string) => void;

export interface LogServiceOptions {
  level?: LogLevel;
  json?: boolean;
  writer?: LogWriter;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const stderrWriter: LogWriter = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

export class LogService implements ILogService {
  private readonly levelName: LogLevel;
  private readonly level: number;
  private readonly module: string | null;
  private readonly json: boolean;
  private readonly writer: LogWriter;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.levelName = options?.level ?? 'info';
    this.level = LOG_LEVELS[this.levelName];
    this.module = options?.module ?? null;
    this.json = options?.json ?? (process.env.NODE_ENV === 'production');
    this.writer = options?.writer ?? stderrWriter;
  }

  debug(message: string, data?: unknown): void {
    if (this.level <= LOG_LEVELS.debug) this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    if (this.level <= LOG_LEVELS.info) this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    if (this.level <= LOG_LEVELS.warn) this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.levelName,
      json: this.json,
      writer: this.writer,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (this.json) {
      this.writer(level, JSON.stringify({
        level,
        ts: new Date().toISOString(),
        ...(this.module ? { module: this.module } : {}),
        msg: message,
        ...toRecord(data),
      }));
      return;
    }

    const prefix = this.module ? `[${this.module}] ` : '';
    const suffix = data !== undefined ? ` ${inspect(data, { depth: 4, breakLength: Infinity })}` : '';
    this.writer(level, `${prefix}${message}${suffix}`);
  }
}

function toRecord(data: unknown): Record<string, unknown> {
  if (data === undefined) return {};
  if (data instanceof Error) return { error: data.message };
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    return Object.fromEntries(Object.entries(data));
  }
  return { data };
}

/**
 * Create a new LogService instance.
 */
export function createLogService(options?: LogServiceOptions): ILogService {
  return new LogService(options);
}
