/**
 * Structured logging utility for parlance
 *
 * Provides consistent logging across the packages with:
 * - Log levels (debug, info, warn, error)
 * - Structured context for debugging
 * - Silent mode for embedding in host applications
 * - Optional JSON output for log aggregation
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

export class Logger {
  private static instance: Logger | undefined;
  private level: LogLevel = LogLevel.INFO;
  private jsonOutput = false;

  private constructor() {
    this.level = parseLevel(process.env.PARLANCE_LOG_LEVEL) ?? LogLevel.INFO;
    this.jsonOutput = process.env.PARLANCE_LOG_JSON === 'true';
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Set the minimum log level
   */
  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Enable/disable JSON output format
   */
  public setJsonOutput(enabled: boolean): void {
    this.jsonOutput = enabled;
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  private formatMessage(entry: LogEntry): string {
    if (this.jsonOutput) {
      return JSON.stringify({
        ...entry,
        level: LogLevel[entry.level],
      });
    }

    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    return `[${LogLevel[entry.level]}] ${entry.message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (level === LogLevel.SILENT || !this.isLevelEnabled(level)) {
      return;
    }

    const formatted = this.formatMessage({
      level,
      message,
      timestamp: new Date().toISOString(),
      context,
    });

    switch (level) {
      case LogLevel.ERROR:
        console.error(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      case LogLevel.INFO:
        console.info(formatted);
        break;
      default:
        console.debug(formatted);
    }
  }

  /**
   * Log debug message (only shown when PARLANCE_LOG_LEVEL=DEBUG)
   */
  public debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Log a warning with the error's name and message attached
   */
  public warnWithError(message: string, error: unknown, context?: LogContext): void {
    const errorContext: LogContext = { ...context };

    if (error instanceof Error) {
      errorContext.errorMessage = error.message;
      errorContext.errorName = error.name;
    } else {
      errorContext.error = String(error);
    }

    this.log(LogLevel.WARN, message, errorContext);
  }
}

/**
 * Get the singleton logger instance
 */
export function getLogger(): Logger {
  return Logger.getInstance();
}

export const logger = Logger.getInstance();
