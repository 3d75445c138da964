/**
 * Logging for the fine-tunes client.
 *
 * Loggers only observe requests. Errors are always rethrown to the caller,
 * whether or not they were logged on the way.
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'off'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  off: 5,
};

export interface LogConfig {
  /** Minimum level that is written. */
  level: LogLevel;
  includeTimestamps: boolean;
  /** Replace values of secret-looking keys with `[REDACTED]`. */
  redactSensitive: boolean;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'warn',
  includeTimestamps: true,
  redactSensitive: true,
};

export interface Logger {
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const SENSITIVE_KEYS = ['api_key', 'apikey', 'authorization', 'password', 'secret', 'token'];

export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;

  constructor(config: Partial<LogConfig> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level === 'off' || !this.shouldLog(level)) return;

    const parts: string[] = [];

    if (this.config.includeTimestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);

    if (context) {
      parts.push(JSON.stringify(this.redactContext(context)));
    }

    const output = parts.join(' ');

    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
      case 'trace':
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private redactContext(context: Record<string, unknown>): Record<string, unknown> {
    if (!this.config.redactSensitive) return context;

    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      if (SENSITIVE_KEYS.some((sk) => key.toLowerCase().includes(sk))) {
        redacted[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        redacted[key] = this.redactContext(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class NoopLogger implements Logger {
  log(): void {}
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export function createLogger(config?: Partial<LogConfig>): Logger {
  if (config?.level === 'off') {
    return new NoopLogger();
  }
  return new ConsoleLogger(config);
}
