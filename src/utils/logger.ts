export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LEVEL_ORDER as readonly string[]).includes(value);
}

/**
 * Console logger with level filtering. Everything goes to stderr so that
 * reports written to stdout stay machine-readable.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(level: LogLevel = LogLevel.ERROR) {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    let formatted = `${timestamp} [${level.toUpperCase()}] ${message}`;

    if (meta instanceof Error) {
      // JSON.stringify(new Error()) is {}
      formatted += `\n${JSON.stringify({ name: meta.name, message: meta.message, stack: meta.stack }, null, 2)}`;
    } else if (meta !== null && typeof meta === 'object') {
      formatted += `\n${JSON.stringify(meta, null, 2)}`;
    } else if (meta !== undefined) {
      formatted += ` ${String(meta)}`;
    }

    return formatted;
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (this.shouldLog(level)) {
      process.stderr.write(`${this.formatMessage(level, message, meta)}\n`);
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (env.HOLDBACK_VERBOSE === '1') return LogLevel.DEBUG;
  const configured = env.HOLDBACK_LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) return configured;
  return LogLevel.ERROR;
}

export const logger = new ConsoleLogger(levelFromEnv(process.env));
