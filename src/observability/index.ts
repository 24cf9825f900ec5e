/**
 * Structured logging for the MWS signer.
 */

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Context keys whose values never reach the output (compared lower-cased).
 */
const SENSITIVE_FIELDS = new Set([
  'secret',
  'secretaccesskey',
  'secret_access_key',
  'signature',
  'mwsauthtoken',
  'mws_auth_token',
  'authorization',
  'password',
  'token',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redacts sensitive fields from an object.
 */
export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  context?: Record<string, unknown>;
  format?: 'json' | 'pretty';
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly format: 'json' | 'pretty';

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.format = options.format ?? 'pretty';
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const mergedContext = redactSensitive({ ...this.context, ...context });
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level].toUpperCase();

    let line: string;
    if (this.format === 'json') {
      line = JSON.stringify({
        timestamp,
        level: levelName,
        message,
        ...mergedContext,
      });
    } else {
      const contextStr = Object.keys(mergedContext).length > 0
        ? ` ${JSON.stringify(mergedContext)}`
        : '';
      line = `[${timestamp}] ${levelName}: ${message}${contextStr}`;
    }

    switch (level) {
      case LogLevel.Error:
        console.error(line);
        break;
      case LogLevel.Warn:
        console.warn(line);
        break;
      case LogLevel.Debug:
      case LogLevel.Trace:
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

/**
 * No-op logger, used when no logger is configured.
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  debug(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  info(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  warn(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  error(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}
