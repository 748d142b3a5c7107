/**
 * @cae/utils - Shared utilities package
 *
 * Golden Path: This package exports only:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

export { logger, Logger, winstonLogger, createLogger } from './logger.js';
export type { LogContext, LogLevel } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
