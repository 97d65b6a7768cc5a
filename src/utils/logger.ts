/**
 * Site logging system
 * Structured, level-filtered log lines with module and operation tags
 */

import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export type LogData = Record<string, unknown>;

export interface LogEntry {
  /** Log level */
  level: LogLevel;

  /** Log message */
  message: string;

  /** Module name */
  module: string;

  /** Operation name */
  operation?: string;

  timestamp: Date;

  /** Additional data */
  data?: LogData;

  error?: Error;
}

export interface LoggerOptions {
  /** Minimum log level */
  minLevel?: LogLevel;

  /** Write to the console */
  consoleOutput?: boolean;

  /** Append to a file */
  fileOutput?: boolean;

  /** File output path */
  filePath?: string;

  /** Module name */
  moduleName?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

/**
 * Parse a level name, falling back when it is not one of ours
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) {
    return fallback;
  }
  const lower = value.toLowerCase();
  const match = Object.values(LogLevel).find(level => level === lower);
  return match ?? fallback;
}

export class AppLogger {
  private options: Required<Omit<LoggerOptions, 'filePath'>> & { filePath?: string };

  constructor(options: LoggerOptions = {}) {
    this.options = {
      minLevel: LogLevel.INFO,
      consoleOutput: true,
      fileOutput: false,
      moduleName: 'site',
      ...options
    };
  }

  /**
   * Debug log
   */
  debug(message: string, data?: LogData, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  /**
   * Info log
   */
  info(message: string, data?: LogData, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  /**
   * Warning log
   */
  warn(message: string, data?: LogData, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  /**
   * Error log
   */
  error(message: string, error?: Error, data?: LogData, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  /**
   * Fatal log
   */
  fatal(message: string, error?: Error, data?: LogData, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  get moduleName(): string {
    return this.options.moduleName;
  }

  get minLevel(): LogLevel {
    return this.options.minLevel;
  }

  /**
   * Change the minimum level of this logger
   */
  setMinLevel(level: LogLevel): void {
    this.options.minLevel = level;
  }

  /**
   * Route file output to a path, or switch it off with undefined
   */
  setFileOutput(filePath: string | undefined): void {
    this.options.fileOutput = Boolean(filePath);
    this.options.filePath = filePath;
  }

  private log(
    level: LogLevel,
    message: string,
    data?: LogData,
    operation?: string,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.options.moduleName,
      operation,
      timestamp: new Date(),
      data,
      error
    };

    if (this.options.consoleOutput) {
      this.writeToConsole(entry);
    }

    if (this.options.fileOutput && this.options.filePath) {
      this.writeToFile(entry, this.options.filePath);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.minLevel];
  }

  /**
   * Format a log entry as text
   */
  static format(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const moduleStr = `[${entry.module}]`;
    const operationStr = entry.operation ? ` [${entry.operation}]` : '';

    let logMessage = `${timestamp} ${levelStr} ${moduleStr}${operationStr} ${entry.message}`;

    if (entry.error) {
      logMessage += `\nError: ${entry.error.message}`;
      if (entry.error.stack) {
        logMessage += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      logMessage += `\nData: ${JSON.stringify(entry.data, null, 2)}`;
    }

    return logMessage;
  }

  private writeToConsole(entry: LogEntry): void {
    const logMessage = AppLogger.format(entry);

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(logMessage);
        break;
    }
  }

  private writeToFile(entry: LogEntry, filePath: string): void {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.appendFileSync(filePath, AppLogger.format(entry) + '\n', 'utf-8');
    } catch (error) {
      // file output stays off after the first failure
      this.options.fileOutput = false;
      console.error(`Log file ${filePath} is not writable: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Create a logger for a sub-module
   */
  createSubLogger(moduleName: string): AppLogger {
    const child = new AppLogger({
      ...this.options,
      moduleName: `${this.options.moduleName}.${moduleName}`
    });
    children.add(child);
    return child;
  }
}

const children = new Set<AppLogger>();

/**
 * Default logger instance
 */
export const defaultLogger = new AppLogger({
  minLevel: parseLogLevel(process.env.LOG_LEVEL)
});

/**
 * Apply level and file settings to the default logger and every sub-logger
 */
export function configureLogging(options: { minLevel: LogLevel; filePath?: string }): void {
  for (const logger of [defaultLogger, ...children]) {
    logger.setMinLevel(options.minLevel);
    logger.setFileOutput(options.filePath);
  }
}

export function createHttpLogger(): AppLogger {
  return defaultLogger.createSubLogger('http');
}

export function createEmailLogger(): AppLogger {
  return defaultLogger.createSubLogger('email');
}

export function createMarketingLogger(area: string): AppLogger {
  return defaultLogger.createSubLogger(`marketing.${area}`);
}

export function createStorageLogger(): AppLogger {
  return defaultLogger.createSubLogger('storage');
}

export function createConfigLogger(): AppLogger {
  return defaultLogger.createSubLogger('config');
}
