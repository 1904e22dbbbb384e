import { createHash } from 'crypto';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return LEVEL_ORDER.some(level => level === value);
}

/**
 * Minimum level shared by the root logger and every child
 */
const threshold = {
  level: resolveInitialLevel(),
};

function resolveInitialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toUpperCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  const env = process.env.NODE_ENV || 'development';
  return env === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

export class Logger {
  constructor(private readonly scope?: string) {}

  /**
   * Logger whose lines are prefixed with `[scope]`
   */
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
  }

  getMinLevel(): LogLevel {
    return threshold.level;
  }

  setMinLevel(level: LogLevel): void {
    threshold.level = level;
  }

  private format(entry: LogEntry): string {
    const scope = entry.scope ? ` [${entry.scope}]` : '';
    const base = `[${entry.timestamp}] [${entry.level}]${scope} ${entry.message}`;

    if (entry.meta !== undefined) {
      const metaStr = typeof entry.meta === 'object'
        ? JSON.stringify(entry.meta, null, 2)
        : String(entry.meta);
      return `${base}\n${metaStr}`;
    }

    return base;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(threshold.level);
  }

  private entry(level: LogLevel, message: string, meta: unknown): string {
    return this.format({ timestamp: new Date().toISOString(), level, scope: this.scope, message, meta });
  }

  debug(message: string, meta?: unknown): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    console.log(this.entry(LogLevel.DEBUG, message, meta));
  }

  info(message: string, meta?: unknown): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    console.log(this.entry(LogLevel.INFO, message, meta));
  }

  warn(message: string, meta?: unknown): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    console.warn(this.entry(LogLevel.WARN, message, meta));
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    let meta: unknown = error;

    if (error instanceof Error) {
      meta = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    console.error(this.entry(LogLevel.ERROR, message, meta));
  }
}

export const logger = new Logger();

/**
 * Hash email for privacy-safe logging (PII protection).
 * Returns first 8 chars of SHA256 hash for log correlation.
 */
export function hashEmailForLogging(email: string): string {
  return createHash('sha256').update(email.toLowerCase()).digest('hex').substring(0, 8);
}
