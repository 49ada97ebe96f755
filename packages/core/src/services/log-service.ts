/**
 * ILogService - Structured Logging Interface
 *
 * Usage:
 *   const log = registry.get(Services.Log);
 *   log.info('Stream started', { roomId: 42 });
 *
 *   // Scoped logger for a module
 *   const streamLog = log.child('Stream');
 *   streamLog.info('Connection dropped', { attempt: 2 });
 *   // Output: [Stream] Connection dropped { attempt: 2 }
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * The module name is prepended to all log messages.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
