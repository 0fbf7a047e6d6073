/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for export runs. Operational errors are expected
 * failures that the export loop either recovers from or reports to the user.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Not found error - for missing resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: ErrorContext) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Configuration error - unusable input detected before any export begins
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Query error - a window query failed as a whole
 */
export class QueryError extends AppError {
  public readonly target: string;

  constructor(message: string, target: string, context?: ErrorContext) {
    super(message, 'QUERY_ERROR', 502, { target, ...context });
    this.target = target;
  }
}

/**
 * Partial result - the source returned rows together with an error
 */
export class PartialResultError extends AppError {
  public readonly target: string;

  constructor(message: string, target: string, context?: ErrorContext) {
    super(message, 'PARTIAL_RESULT', 206, { target, ...context });
    this.target = target;
  }
}

/**
 * Schema fetch error - table schema could not be read from the catalog
 */
export class SchemaFetchError extends AppError {
  constructor(message: string, target: string, context?: ErrorContext) {
    super(message, 'SCHEMA_FETCH_ERROR', 502, { target, ...context });
  }
}

/**
 * Target export error - unexpected failure while exporting one target
 */
export class TargetExportError extends AppError {
  public readonly target: string;

  constructor(message: string, target: string, context?: ErrorContext) {
    super(message, 'TARGET_EXPORT_ERROR', 500, { target, ...context });
    this.target = target;
  }
}

/**
 * Sink error - the artifact store could not be created or written
 */
export class SinkError extends AppError {
  constructor(message: string, location?: string, context?: ErrorContext) {
    super(message, 'SINK_ERROR', 500, { location, ...context });
  }
}

/**
 * Cancellation error - the run was interrupted by its abort signal
 */
export class CancellationError extends AppError {
  constructor(message: string = 'Operation cancelled', context?: ErrorContext) {
    super(message, 'CANCELLED', 499, context);
  }
}

/**
 * Query generation error - no usable query could be produced for a question
 */
export class QueryGenerationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'QUERY_GENERATION_ERROR', 422, context);
  }
}

/**
 * Timeout error - for operation timeouts
 */
export class TimeoutError extends AppError {
  public readonly timeoutMs?: number;

  constructor(message: string = 'Operation timed out', timeoutMs?: number, context?: ErrorContext) {
    super(message, 'TIMEOUT_ERROR', 504, { timeoutMs, ...context });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Errors that end the whole run instead of a single window or target
 */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof ConfigurationError ||
    error instanceof SinkError ||
    error instanceof CancellationError
  );
}
