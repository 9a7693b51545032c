/**
 * Logger.ts
 *
 * Type definitions and implementation for structured logging across the server.
 * Provides a clean interface for logging that can be tested, mocked, and swapped
 * without coupling business logic to specific implementations.
 *
 * Usage:
 *   const logger = new StructuredLogger('LapTime');
 *   logger.info('Submission received');
 *   logger.success('New best lap', 'Alice');
 *   logger.warn('Rate limit exceeded', 'token:abc');
 *   logger.error('Failed to store lap', 'Bob');
 *   logger.section('Startup');
 */

/**
 * Log level enumeration
 * - info: Informational message
 * - success: Success/positive result
 * - warn: Recoverable problem or refused request
 * - error: Error or failure
 * - section: Section header/separator
 */
export enum LogLevel {
  Info = 'info',
  Success = 'success',
  Warn = 'warn',
  Error = 'error',
  Section = 'section'
}

/**
 * Structured log entry
 * Includes timestamp, level, message, and optional subject (driver, client identity)
 */
export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  subject?: string;
}

/**
 * Logger callback type
 * Used for dependency injection of logging implementations
 *
 * Usage in functions:
 *   function doWork(onLog?: LoggerCallback) {
 *     onLog?.(LogLevel.Info, 'Starting work');
 *   }
 */
export type LoggerCallback = (
  level: LogLevel,
  message: string,
  subject?: string
) => void;

const DEBUG_ENABLED = (process.env.DEBUG || 'false').toLowerCase() === 'true';

function writeToConsole(prefix: string, level: LogLevel, message: string, subject?: string): void {
  const logPrefix = `[${prefix}]`;
  const levelStr = `[${level.toUpperCase()}]`;
  const subjectStr = subject ? ` (${subject})` : '';

  if (level === LogLevel.Section) {
    console.log(`\n${logPrefix} ${message}`);
  } else if (level === LogLevel.Error) {
    console.error(`${logPrefix} ${levelStr} ${message}${subjectStr}`);
  } else if (level === LogLevel.Warn) {
    console.warn(`${logPrefix} ${levelStr} ${message}${subjectStr}`);
  } else {
    console.log(`${logPrefix} ${levelStr} ${message}${subjectStr}`);
  }
}

/**
 * StructuredLogger class
 * Implements standard logging with a prefix for context
 */
export class StructuredLogger {
  constructor(
    private prefix: string,
    private onLog?: LoggerCallback
  ) {}

  info(message: string, subject?: string): void {
    this.log(LogLevel.Info, message, subject);
  }

  success(message: string, subject?: string): void {
    this.log(LogLevel.Success, message, subject);
  }

  warn(message: string, subject?: string): void {
    this.log(LogLevel.Warn, message, subject);
  }

  error(message: string, subject?: string): void {
    this.log(LogLevel.Error, message, subject);
  }

  /**
   * Info-level message emitted only when DEBUG=true (or when a callback is injected)
   */
  debug(message: string, subject?: string): void {
    if (DEBUG_ENABLED || this.onLog) {
      this.log(LogLevel.Info, message, subject);
    }
  }

  section(message: string): void {
    this.log(LogLevel.Section, message);
  }

  /**
   * Calls the callback if provided, otherwise logs to console
   */
  private log(level: LogLevel, message: string, subject?: string): void {
    if (this.onLog) {
      this.onLog(level, message, subject);
    } else {
      writeToConsole(this.prefix, level, message, subject);
    }
  }
}

/**
 * Create a logger callback from console logging
 */
export function createConsoleLoggerCallback(prefix: string): LoggerCallback {
  return (level, message, subject) => writeToConsole(prefix, level, message, subject);
}

/**
 * Create a logger callback that collects logs in an array
 * Useful for testing
 */
export function createCollectingLoggerCallback(): [
  LoggerCallback,
  () => LogEntry[]
  ] {
  const logs: LogEntry[] = [];

  const callback: LoggerCallback = (level, message, subject) => {
    logs.push({
      timestamp: Date.now(),
      level,
      message,
      subject
    });
  };

  return [callback, () => logs];
}

/**
 * Create a logger callback that filters based on level
 * Useful for reducing noise in tests
 */
export function createFilteredLoggerCallback(
  baseCallback: LoggerCallback,
  allowedLevels: LogLevel[]
): LoggerCallback {
  return (level, message, subject) => {
    if (allowedLevels.includes(level)) {
      baseCallback(level, message, subject);
    }
  };
}
