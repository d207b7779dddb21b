/**
 * Structured console logger shared by every service in the hub.
 */

import { trace } from '@opentelemetry/api';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  /** Severity */
  level: LogLevel;

  message: string;

  /** Dotted module name, e.g. `weather-hub.api` */
  module: string;

  /** Operation the entry belongs to */
  operation?: string;

  timestamp: Date;

  data?: Record<string, unknown>;

  error?: Error;

  /** Ids of the span active when the entry was written */
  traceId?: string;
  spanId?: string;
}

export interface LoggerOptions {
  minLevel?: LogLevel;

  consoleOutput?: boolean;

  moduleName?: string;

  /** Receives every entry that passes the level filter */
  sink?: (entry: LogEntry) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

export class Logger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      minLevel: LogLevel.INFO,
      consoleOutput: true,
      moduleName: 'weather-hub',
      ...options
    };
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  fatal(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  /**
   * Change the minimum level of this logger
   */
  setLevel(level: LogLevel): void {
    this.options.minLevel = level;
  }

  getModuleName(): string {
    return this.options.moduleName || 'weather-hub';
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.getModuleName(),
      operation,
      timestamp: new Date(),
      data,
      error
    };

    const spanContext = trace.getActiveSpan()?.spanContext();
    if (spanContext) {
      entry.traceId = spanContext.traceId;
      entry.spanId = spanContext.spanId;
    }

    if (this.options.sink) {
      this.options.sink(entry);
    }

    if (this.options.consoleOutput) {
      this.writeToConsole(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const minLevel = this.options.minLevel || LogLevel.INFO;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  }

  private writeToConsole(entry: LogEntry): void {
    console[consoleMethod(entry.level)](formatEntry(entry));
  }

  /**
   * Create a logger for a sub module, e.g. `weather-hub.api.nws`
   */
  createSubLogger(moduleName: string): Logger {
    return new Logger({
      ...this.options,
      moduleName: `${this.getModuleName()}.${moduleName}`
    });
  }
}

/**
 * Render an entry the way it is written to the console
 */
export function formatEntry(entry: LogEntry): string {
  const timestamp = entry.timestamp.toISOString();
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const operationStr = entry.operation ? ` [${entry.operation}]` : '';
  const traceStr = entry.traceId ? ` (trace ${entry.traceId} span ${entry.spanId})` : '';

  let line = `${timestamp} ${levelStr} [${entry.module}]${operationStr} ${entry.message}${traceStr}`;

  if (entry.error) {
    line += `\nError: ${entry.error.message}`;
    if (entry.error.stack) {
      line += `\nStack: ${entry.error.stack}`;
    }
  }

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += `\nData: ${JSON.stringify(entry.data, null, 2)}`;
  }

  return line;
}

function consoleMethod(level: LogLevel): 'debug' | 'info' | 'warn' | 'error' {
  switch (level) {
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.WARN:
      return 'warn';
    default:
      return 'error';
  }
}

/**
 * Parse a level name, falling back when it is not one of ours
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const match = Object.values(LogLevel).find(level => level === value?.toLowerCase());
  return match ?? fallback;
}

export const defaultLogger = new Logger({
  minLevel: parseLogLevel(process.env.LOG_LEVEL)
});

export function createApiLogger(component?: string): Logger {
  const logger = defaultLogger.createSubLogger('api');
  return component ? logger.createSubLogger(component) : logger;
}

export function createWebLogger(component?: string): Logger {
  const logger = defaultLogger.createSubLogger('web');
  return component ? logger.createSubLogger(component) : logger;
}

export function createAppHostLogger(): Logger {
  return defaultLogger.createSubLogger('apphost');
}
