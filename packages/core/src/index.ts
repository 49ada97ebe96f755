/**
 * @fireside/core
 *
 * Shared foundation for the Fireside chat engine: errors, logging,
 * service registry, async primitives and default settings.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Types
export * from './types/index.js';

// Services (ServiceRegistry, logging)
export * from './services/index.js';

// Async primitives
export * from './async/index.js';

// Defaults
export * from './config/index.js';
