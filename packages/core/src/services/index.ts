/**
 * Services exports
 */

// Service Registry (typed DI container)
export {
  ServiceToken,
  ServiceRegistry,
  initServiceRegistry,
  getServiceRegistry,
  hasServiceRegistry,
  resetServiceRegistry,
} from './registry.js';

// Service Tokens
export { Services } from './tokens.js';

// Logging
export type { ILogService, LogLevel } from './log-service.js';
export {
  LogService,
  createLogService,
  type LogWriter,
  type LogServiceOptions,
} from './log-service-impl.js';
export { getLog } from './get-log.js';
