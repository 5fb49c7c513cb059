/**
 * Logging Module
 *
 * All logging goes through this module.
 */

export { default as logger } from './logger.js';
export { createLogger as createConfigLogger } from './configLogger.js';
export type { Logger } from './configLogger.js';
export { describeRequest, describeResponse, describeFailure } from './requestLogger.js';
