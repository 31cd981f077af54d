/**
 * Logger interfaces and implementations
 *
 * Level-based logging to stderr. The reflector only logs at debug level, so
 * output stays quiet unless LOG_LEVEL=DEBUG.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogFormat = 'console' | 'json';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Parse a level name (case-insensitive), falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Default logger - writes to stderr, respects LOG_LEVEL env var
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('DEBUG', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('INFO', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('WARN', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error ? {
        error: error.message,
        stack: error.stack,
        ...context,
      } : context;
      this.write('ERROR', message, errorContext);
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const ctx = context ? ` ${JSON.stringify(context)}` : '';
    console.error(`[${timestamp}] ${level}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger for log aggregation
 */
export class JsonLogger implements Logger {
  private level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.write('error', message, {
        error: error?.message,
        stack: error?.stack,
        ...context,
      });
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    };
    console.error(JSON.stringify(log));
  }
}

/**
 * Create a logger from an explicit format or the LOG_FORMAT env var
 */
export function createLogger(format?: LogFormat, level?: LogLevel): Logger {
  const resolved = format ?? (process.env.LOG_FORMAT === 'json' ? 'json' : 'console');
  return resolved === 'json' ? new JsonLogger(level) : new ConsoleLogger(level);
}
