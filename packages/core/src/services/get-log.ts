/**
 * Logging Utility
 *
 * Provides easy access to scoped loggers anywhere in the codebase.
 * Loggers resolve their target on every call, so a module-level
 * `const log = getLog('Stream')` picks up the LogService registered later
 * during startup. Falls back to a stderr LogService while none is registered.
 *
 * Usage:
 *   import { getLog } from '@fireside/core';
 *   const log = getLog('Stream');
 *   log.info('Connected', { roomId: 42 });
 */

import { hasServiceRegistry, getServiceRegistry } from './registry.js';
import { Services } from './tokens.js';
import { LogService } from './log-service-impl.js';
import type { ILogService } from './log-service.js';

const scopedLoggers = new Map<string, ILogService>();

class ScopedLog implements ILogService {
  private fallback: ILogService | null = null;
  private source: ILogService | null = null;
  private resolved: ILogService | null = null;

  constructor(private readonly module: string) {}

  debug(message: string, data?: unknown): void {
    this.target().debug(message, data);
  }

  info(message: string, data?: unknown): void {
    this.target().info(message, data);
  }

  warn(message: string, data?: unknown): void {
    this.target().warn(message, data);
  }

  error(message: string, data?: unknown): void {
    this.target().error(message, data);
  }

  child(module: string): ILogService {
    return getLog(`${this.module}:${module}`);
  }

  private target(): ILogService {
    const registered = hasServiceRegistry() ? getServiceRegistry().tryGet(Services.Log) : null;
    if (registered) {
      if (registered !== this.source || !this.resolved) {
        this.source = registered;
        this.resolved = registered.child(this.module);
      }
      return this.resolved;
    }

    this.fallback ??= new LogService({ module: this.module, json: false });
    return this.fallback;
  }
}

/**
 * Get a scoped logger for a module.
 */
export function getLog(module: string): ILogService {
  let logger = scopedLoggers.get(module);
  if (!logger) {
    logger = new ScopedLog(module);
    scopedLoggers.set(module, logger);
  }
  return logger;
}
