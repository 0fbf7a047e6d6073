/**
 * Error Handler
 * =============
 * Centralized error handling utilities.
 */

import { AppError, isFatalError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message?: string;
  fatal: boolean;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
          statusCode: err.statusCode,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    fatal: isFatalError(err),
  };
}
