/**
 * Structured logging for extraction runs
 */

/**
 * Logger interface for structured logging
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  colors?: boolean;
  /** Where lines go; stderr keeps stdout free for command output */
  stream?: 'stdout' | 'stderr';
  /** Overrides `stream`, mainly for tests */
  write?: (line: string) => void;
}

const MAX_STRING_LENGTH = 1000;
const MAX_ARRAY_LENGTH = 50;

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;
  private readonly timestamps: boolean;
  private readonly colors: boolean;
  private readonly stream: 'stdout' | 'stderr';
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.prefix = options.prefix ?? '';
    this.timestamps = options.timestamps ?? true;
    this.colors = options.colors ?? true;
    this.stream = options.stream ?? 'stdout';
    this.write = options.write ?? (line => {
      if (this.stream === 'stderr') {
        console.error(line);
      } else {
        console.log(line);
      }
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log('DEBUG', message, meta, '\x1b[36m');
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.log('INFO', message, meta, '\x1b[32m');
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.log('WARN', message, meta, '\x1b[33m');
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.log('ERROR', message, meta, '\x1b[31m');
    }
  }

  private log(
    level: string,
    message: string,
    meta: Record<string, unknown> | undefined,
    color: string
  ): void {
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(this.colors ? `${color}${level}\x1b[0m` : level);

    if (this.prefix) {
      parts.push(`[${this.prefix}]`);
    }

    parts.push(message);

    if (meta && Object.keys(meta).length > 0) {
      // Compact JSON; chunk texts can be tens of thousands of characters
      parts.push(JSON.stringify(sanitizeMeta(meta)));
    }

    this.write(parts.join(' '));
  }
}

/**
 * Truncate long strings and arrays, and replace the `text` of chunk-like
 * objects with its length.
 */
export function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(meta)) {
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.length > MAX_STRING_LENGTH
      ? `${value.slice(0, MAX_STRING_LENGTH)}... [${value.length} chars]`
      : value;
  }

  if (Array.isArray(value)) {
    const limited: unknown[] = value.slice(0, MAX_ARRAY_LENGTH).map(sanitizeValue);
    if (value.length > MAX_ARRAY_LENGTH) {
      limited.push(`... [${value.length - MAX_ARRAY_LENGTH} more items]`);
    }
    return limited;
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).map(([key, nested]): [string, unknown] =>
      key === 'text' && typeof nested === 'string'
        ? [key, `[omitted: ${nested.length} chars]`]
        : [key, sanitizeValue(nested)]
    );
    return Object.fromEntries(entries);
  }

  return value;
}

/**
 * No-op logger for testing or silent mode
 */
export class SilentLogger implements Logger {
  debug(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }
}

/**
 * Map a level name (`debug`, `info`, `warn`, `error`, `silent`) to a LogLevel
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

/**
 * Create a logger based on environment.
 * Silent under NODE_ENV=test; otherwise TEXTHARVEST_LOG_LEVEL picks the level
 * unless the options set one.
 */
export function createLogger(options?: ConsoleLoggerOptions): Logger {
  if (process.env.NODE_ENV === 'test') {
    return new SilentLogger();
  }

  return new ConsoleLogger({
    ...options,
    level: options?.level ?? parseLogLevel(process.env.TEXTHARVEST_LOG_LEVEL),
    colors: options?.colors ?? !process.env.NO_COLOR,
  });
}
