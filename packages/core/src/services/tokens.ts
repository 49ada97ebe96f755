/**
 * Service Tokens - Typed keys for ServiceRegistry
 */

import { ServiceToken } from './registry.js';
import type { ILogService } from './log-service.js';

export const Services = {
  /** Structured logging */
  Log: new ServiceToken<ILogService>('log'),
} as const;
