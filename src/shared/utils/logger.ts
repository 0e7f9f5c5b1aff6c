/**
 * Structured Logging Utility
 * Levelled, colourised console logger with JSON metadata
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogMeta = Record<string, unknown>;

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const levelColors: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.gray,
  [LogLevel.INFO]: colors.blue,
  [LogLevel.WARN]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
};

const levelPriority: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

/**
 * JSON replacer that keeps name, message and stack of nested Error values
 */
function serializeErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

interface LoggerConfig {
  level: LogLevel;
  enableColors: boolean;
  enableTimestamp: boolean;
}

/**
 * Parse a LOG_LEVEL value, falling back to INFO for anything unknown
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? LogLevel.INFO;
}

class Logger {
  private config: LoggerConfig = {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enableColors: process.env.NODE_ENV !== 'production',
    enableTimestamp: true,
  };

  private colorize(text: string, color: string): string {
    if (!this.config.enableColors) {
      return text;
    }
    return `${color}${text}${colors.reset}`;
  }

  /**
   * Format log line: timestamp, level, message, metadata
   */
  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const parts: string[] = [];

    if (this.config.enableTimestamp) {
      parts.push(this.colorize(new Date().toISOString(), colors.gray));
    }

    parts.push(this.colorize(level.toUpperCase().padEnd(5), levelColors[level]));
    parts.push(message);

    if (meta && Object.keys(meta).length > 0) {
      parts.push(this.colorize(JSON.stringify(meta, serializeErrors, 0), colors.gray));
    }

    return parts.join(' ');
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.config.level];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formattedMessage = this.formatMessage(level, message, meta);

    switch (level) {
      case LogLevel.ERROR:
        console.error(formattedMessage);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage);
        break;
      case LogLevel.DEBUG:
        console.debug(formattedMessage);
        break;
      default:
        console.log(formattedMessage);
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  /**
   * Error level logging
   * Error instances are serialised with name, message and stack
   */
  error(message: string, error?: Error | LogMeta): void {
    const meta: LogMeta = {};

    if (error instanceof Error) {
      meta.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error) {
      Object.assign(meta, error);
    }

    this.log(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setColors(enabled: boolean): void {
    this.config.enableColors = enabled;
  }
}

export const logger = new Logger();

// Export for testing
export { Logger };
