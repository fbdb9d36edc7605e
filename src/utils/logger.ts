/**
 * Logger for the Material Script Manager
 *
 * Supports different log levels and timing operations.
 */

import { DEFAULT_CONFIG } from '../constants/config';

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  duration?: boolean;
  prefix?: string;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  mode?: string | undefined;
  filePath?: string | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Internal Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix || DEFAULT_CONFIG.LOG_PREFIX
    };
  }

  /**
   * Format timestamp
   */
  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().substring(11, 23);
  }

  /**
   * Get colors for terminal output
   */
  private getColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m'; // Gray
      case LogLevel.INFO:
        return '\x1b[36m'; // Cyan
      case LogLevel.WARN:
        return '\x1b[33m'; // Yellow
      case LogLevel.ERROR:
        return '\x1b[31m'; // Red
    }
  }

  private getResetColor(): string {
    return '\x1b[0m';
  }

  /**
   * Check if should log based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const color = this.getColor(level);
    const reset = this.getResetColor();
    const prefix = `${this.options.prefix} [${level.toUpperCase()}]`;
    const timeStr = timestamp ? ` @ ${timestamp}` : '';

    const logMessage = `${color}${prefix}${timeStr} ${message}${reset}`;

    if (context) {
      console.log(logMessage, context);
    } else {
      console.log(logMessage);
    }
  }

  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext, level: LogLevel = LogLevel.INFO): void {
    const startTime = this.startTimes.get(operation);
    if (startTime === undefined) return;

    this.startTimes.delete(operation);
    this.log(level, `Completed operation: ${operation}`, {
      operation,
      ...(this.options.duration ? { duration: Date.now() - startTime } : {}),
      ...context
    });
  }

  /**
   * Log file operation
   */
  logFileOperation(operation: string, filePath: string, context?: LoggerContext): void {
    this.debug(`File operation: ${operation}`, {
      operation,
      filePath,
      ...context
    });
  }

  /**
   * Log configuration
   */
  logConfig(config: Record<string, unknown>, context?: LoggerContext): void {
    this.debug('Configuration loaded', {
      config,
      ...context
    });
  }

  /**
   * Log error with context
   */
  logError(error: Error, context?: LoggerContext): void {
    this.error(`Error occurred: ${error.message}`, {
      error: error.message,
      stack: error.stack,
      ...context
    });
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: LogLevel.INFO,
  timestamp: true,
  duration: true,
  prefix: DEFAULT_CONFIG.LOG_PREFIX
});

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Logger factory for specific operations
 */
export const LoggerFactory = {
  /**
   * Create logger for a scan run
   */
  forRun(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: true,
      prefix: `${DEFAULT_CONFIG.LOG_PREFIX}-Run`
    });
  },

  /**
   * Create logger for the command line entry point
   */
  forCli(): Logger {
    return createLogger({
      level: LogLevel.INFO,
      timestamp: false,
      duration: false,
      prefix: DEFAULT_CONFIG.LOG_PREFIX
    });
  }
};
