/**
 * Centralized logging system with multiple output levels
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  context?: string;
  /** Case-insensitive; falls back to the process-wide level when omitted */
  level?: string;
}

/**
 * Parse a user-supplied level name ("warn", "WARN"), or null when unknown
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  return LEVELS.find(level => level === normalized) ?? null;
}

export class Logger {
  private static defaultLevel: LogLevel | null = null;

  private logs: LogEntry[] = [];
  private maxLogs = 1000;
  private context?: string;
  private minLevel: LogLevel | null;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.minLevel = parseLogLevel(options.level);
  }

  /**
   * Level used by every logger constructed without an explicit one
   */
  static setDefaultLevel(level: LogLevel): void {
    Logger.defaultLevel = level;
  }

  static getDefaultLevel(): LogLevel {
    return Logger.defaultLevel ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    const minIndex = LEVELS.indexOf(this.minLevel ?? Logger.getDefaultLevel());
    return LEVELS.indexOf(level) >= minIndex;
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: this.context });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: this.context });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: this.context });
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      data,
      error: error instanceof Error ? error : undefined,
      context: this.context
    });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : this.logs;
  }

  clear(): void {
    this.logs = [];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

// Shared instance for code without a context of its own
export const logger = new Logger({ context: 'shoebox' });

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public statusCode: number = 500,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { name: string; message: string; code: string; statusCode: number; context?: Record<string, unknown> } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context
    };
  }
}

/**
 * Normalize any thrown value into an AppError and log it
 */
export function handleError(error: unknown, context?: string): AppError {
  const contextLogger = context ? new Logger({ context }) : logger;

  if (error instanceof AppError) {
    contextLogger.error(error.message, error);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR', 500);
    contextLogger.error(error.message, error);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR', 500);
  contextLogger.error(String(error));
  return appError;
}

/**
 * True for a Node system error carrying one of the given errno codes
 * (any code when none are given)
 */
export function isErrnoException(error: unknown, ...codes: string[]): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
    return false;
  }
  return codes.length === 0 || codes.includes(error.code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
