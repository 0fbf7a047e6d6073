/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with namespaced loggers, optional file
 * rotation, and context propagation.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  TRACE = 'trace',
}

export interface LogContext {
  workspaceId?: string;
  target?: string;
  window?: string | number;
  runId?: string;
  [key: string]: unknown;
}

interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || 'info',
  enableConsole: process.env.LOG_CONSOLE !== 'false',
  enableFile: process.env.LOG_FILE === 'true',
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  maxFiles: process.env.LOG_MAX_FILES || '14d',
  maxSize: process.env.LOG_MAX_SIZE || '20m',
};

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Human-readable console output for interactive use
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? ' ' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

// Console goes to stderr so command output on stdout stays parseable
if (defaultConfig.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: defaultConfig.level,
      stderrLevels: ['error', 'warn', 'info', 'debug', 'verbose', 'silly'],
    })
  );
}

if (defaultConfig.enableFile && process.env.NODE_ENV !== 'test') {
  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'loggather-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );
}

const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'loggather' },
  transports,
  exitOnError: false,
});

// Logger class with context support and package namespacing
class Logger {
  private context: LogContext = {};
  private namespace: string = 'loggather';

  constructor(namespace?: string) {
    if (namespace) {
      this.namespace = namespace;
    }
  }

  /**
   * Set context that will be included in all subsequent log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getNamespace(): string {
    return this.namespace;
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }

  /**
   * Most verbose level; winston has no trace, so it rides on debug
   */
  trace(message: string, context?: LogContext): void {
    winstonLogger.debug(message, { ...this.mergeContext(context), verbosity: 'trace' });
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger('loggather');

export { Logger };

export { winstonLogger };
