/**
 * Logging utility, re-exported from @fireside/core
 *
 * Usage:
 *   import { getLog } from './log.js';
 *   const log = getLog('Stream');
 */

export { getLog } from '@fireside/core';
