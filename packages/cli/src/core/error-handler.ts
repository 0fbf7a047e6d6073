/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { AppError, CancellationError, logger } from '@loggather/utils';

/**
 * Exit code for a run stopped by SIGINT
 */
export const CANCELLED_EXIT_CODE = 130;

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /client[_-]?assertion/i,
  /bearer/i,
  /authorization/i,
];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }

  return 'An unexpected error occurred';
}

/**
 * Hints for Azure failures the user can act on
 */
export function handleAzureError(error: unknown): string {
  if (error instanceof Error && !(error instanceof AppError)) {
    const message = error.message.toLowerCase();

    if (message.includes('credentialunavailable') || message.includes('defaultazurecredential')) {
      return 'No Azure credential available. Run "az login" or set the AZURE_* environment variables.';
    }

    if (message.includes('authorizationfailed') || message.includes('403')) {
      return 'Access denied by Azure. Check your role assignments on the workspace.';
    }

    if (message.includes('enotfound') || message.includes('econnrefused')) {
      return 'Network error. Please check your connection and try again.';
    }
  }

  return formatError(error);
}

/**
 * Log error with full context (for debugging); context values that look
 * sensitive are redacted
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  if (error instanceof Error) {
    logger.error('CLI error', error, { context: sanitizedContext });
  } else {
    logger.error('CLI error', String(error), { context: sanitizedContext });
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return handleAzureError(error);
}

export function exitCodeFor(error: unknown): number {
  return error instanceof CancellationError ? CANCELLED_EXIT_CODE : 1;
}
