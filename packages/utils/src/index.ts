/**
 * @loggather/utils - Shared utilities package
 *
 * Logger, configuration loading and error handling. No Azure or filesystem
 * code lives here.
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';
export { createPackageLogger, getPackageLoggers } from './logging/index.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
