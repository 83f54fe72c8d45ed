// Logging for the skill runtime
import { AppError } from './errors';
import { config } from './config';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context: Record<string, unknown>;
  error?: Error;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
}

const LEVEL_ORDER = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

/**
 * Centralized logging service
 */
export class Logger {
  private static instance: Logger | undefined;
  private config: LoggerConfig;

  private constructor(config: LoggerConfig) {
    this.config = config;
  }

  public static getInstance(config?: LoggerConfig): Logger {
    if (!Logger.instance) {
      if (!config) {
        throw new Error('Logger must be initialized with config');
      }
      Logger.instance = new Logger(config);
    }
    return Logger.instance;
  }

  /**
   * Drop the current instance so the next call can configure a new one
   */
  public static reset(): void {
    Logger.instance = undefined;
  }

  public getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Log an error with full context
   */
  public error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const entry: LogEntry = {
      level: LogLevel.ERROR,
      message,
      timestamp: new Date(),
      context: context || {}
    };

    if (error) {
      entry.error = error;
    }

    this.log(entry);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.log({ level: LogLevel.WARN, message, timestamp: new Date(), context: context || {} });
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.log({ level: LogLevel.INFO, message, timestamp: new Date(), context: context || {} });
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.log({ level: LogLevel.DEBUG, message, timestamp: new Date(), context: context || {} });
  }

  /**
   * Log an application error with its code and context flattened in
   */
  public logAppError(error: AppError, context?: Record<string, unknown>): void {
    const logContext = {
      ...context,
      errorCode: error.code,
      isOperational: error.isOperational,
      errorContext: error.context
    };

    this.error(error.message, error, logContext);
  }

  /**
   * Log how long an operation took
   */
  public logPerformance(operation: string, duration: number, context?: Record<string, unknown>): void {
    const message = `Performance: ${operation} took ${duration}ms`;
    const logContext = {
      ...context,
      operation,
      duration,
      type: 'performance'
    };

    // A tick or dispatch longer than a frame stalls the game loop
    if (duration > 50) {
      this.warn(message, logContext);
    } else {
      this.debug(message, logContext);
    }
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level) || !this.config.enableConsole) {
      return;
    }
    this.logToConsole(entry);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.config.level);
  }

  private logToConsole(entry: LogEntry): void {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);

    let logLine = `[${timestamp}] ${level} ${entry.message}`;

    if (Object.keys(entry.context).length > 0) {
      logLine += `\nContext: ${JSON.stringify(entry.context, null, 2)}`;
    }

    if (entry.error) {
      logLine += `\nError: ${entry.error.message}`;
      if (entry.error.stack) {
        logLine += `\nStack: ${entry.error.stack}`;
      }
    }

    switch (entry.level) {
      case LogLevel.ERROR:
        console.error(logLine);
        break;
      case LogLevel.WARN:
        console.warn(logLine);
        break;
      case LogLevel.INFO:
        console.info(logLine);
        break;
      case LogLevel.DEBUG:
        console.debug(logLine);
        break;
    }
  }
}

export const parseLogLevel = (value: string): LogLevel => {
  const match = LEVEL_ORDER.find(level => level === value.toLowerCase());
  return match ?? LogLevel.INFO;
};

/**
 * Default logger configuration
 */
export const getDefaultLoggerConfig = (): LoggerConfig => ({
  level: parseLogLevel(config.logging.level),
  enableConsole: true
});

/**
 * Initialize logger with default config
 */
export const initializeLogger = (loggerConfig?: LoggerConfig): Logger => {
  return Logger.getInstance(loggerConfig || getDefaultLoggerConfig());
};

/**
 * Get logger instance, configuring it with defaults on first use
 */
export const getLogger = (): Logger => {
  return initializeLogger();
};
