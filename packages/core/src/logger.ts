/**
 * @module
 * Structured logging with pluggable transports.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@sockrpc/core';
 *
 * const log = createLogger({ name: 'rpc-client', level: 'DEBUG' });
 *
 * log.debug('Connected', { host: '127.0.0.1', port: 9000 });
 * log.error('Call failed', error, { function: 'add' });
 *
 * // Child logger with extra context
 * const connLog = log.child({ endpoint: '127.0.0.1:9000' });
 * ```
 */

import { getEnv } from "./env.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogTransport } from "./transports/types.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export type { LogTransport } from "./transports/types.js";

/**
 * Log level constants mapping level names to numeric values.
 * Lower values are more verbose; higher values are more severe.
 */
export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: 100,
} as const;

/** Log level name string literal type (TRACE, DEBUG, INFO, WARN, ERROR, FATAL, SILENT) */
export type LogLevelName = keyof typeof LogLevel;

/** Numeric log level value type */
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/**
 * Structured error information included in log entries.
 */
export interface ErrorInfo {
  /** Error class name (e.g., "ConnectionError") */
  name: string;
  /** Error message */
  message: string;
  /** Stack trace if available */
  stack: string | undefined;
}

/**
 * Structured log entry passed to transports.
 */
export interface LogEntry {
  /** Log level name */
  level: LogLevelName;
  /** Numeric log level value */
  levelValue: LogLevelValue;
  /** Log message */
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Additional context data */
  context: Record<string, unknown> | undefined;
  /** Error information if an error was logged */
  error: ErrorInfo | undefined;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level: LogLevelName | undefined;
  /** Logger name/module */
  name: string | undefined;
  /** Base context added to all logs */
  context: Record<string, unknown> | undefined;
  /** Custom transports */
  transports: LogTransport[] | undefined;
  /** Pretty print in development */
  pretty: boolean | undefined;
  /** Context fields to replace with [REDACTED] */
  redact: string[] | undefined;
  /** Timestamp format */
  timestamp: boolean | (() => string) | undefined;
}

/**
 * Check whether a string names a log level
 */
export function isLogLevelName(value: string | undefined): value is LogLevelName {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LogLevel, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive fields from context.
 * Dotted names such as "auth.secret" reach into nested objects.
 */
function redactFields(
  obj: Record<string, unknown>,
  fields: string[]
): Record<string, unknown> {
  const result = { ...obj };
  for (const field of fields) {
    if (field in result) {
      result[field] = "[REDACTED]";
    }
    const parts = field.split(".");
    if (parts.length > 1) {
      let current: Record<string, unknown> | undefined = result;
      for (const part of parts.slice(0, -1)) {
        const val: unknown = current[part];
        if (!isRecord(val)) {
          current = undefined;
          break;
        }
        current = val;
      }
      const lastPart = parts[parts.length - 1];
      if (lastPart && current && lastPart in current) {
        current[lastPart] = "[REDACTED]";
      }
    }
  }
  return result;
}

/**
 * Structured logger with support for multiple transports and redaction.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'rpc', level: 'DEBUG' });
 * logger.info('Listening', { port: 9000 });
 * logger.error('Request failed', new Error('boom'), { function: 'add' });
 * ```
 */
export class Logger {
  private readonly level: LogLevelValue;
  private readonly levelName: LogLevelName;
  private readonly name: string | undefined;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];
  private readonly redactFields: string[];
  private readonly timestampFn: () => string;

  constructor(config: Partial<LoggerConfig> = {}) {
    const envLevel = getEnv("LOG_LEVEL");
    this.levelName = config.level ?? (isLogLevelName(envLevel) ? envLevel : "INFO");
    this.level = LogLevel[this.levelName];
    this.name = config.name;
    this.context = config.context ?? {};
    this.transports = config.transports ?? [
      new ConsoleTransport(config.pretty !== undefined ? { pretty: config.pretty } : {}),
    ];
    this.redactFields = config.redact ?? [];

    if (config.timestamp === false) {
      this.timestampFn = () => "";
    } else if (typeof config.timestamp === "function") {
      this.timestampFn = config.timestamp;
    } else {
      this.timestampFn = () => new Date().toISOString();
    }
  }

  /**
   * Whether a message at the given level would be emitted
   */
  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= this.level;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.levelName,
      name: this.name,
      context: { ...this.context, ...context },
      transports: this.transports,
      redact: this.redactFields,
      timestamp: this.timestampFn,
    });
  }

  private log(
    level: LogLevelName,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    const levelValue = LogLevel[level];
    if (levelValue < this.level) return;

    let finalContext = { ...this.context };
    if (this.name) {
      finalContext["module"] = this.name;
    }
    if (context) {
      finalContext = { ...finalContext, ...context };
    }

    finalContext = redactFields(finalContext, this.redactFields);

    const entry: LogEntry = {
      level,
      levelValue,
      message,
      timestamp: this.timestampFn(),
      context: Object.keys(finalContext).length > 0 ? finalContext : undefined,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : undefined,
    };

    for (const transport of this.transports) {
      const pending = transport.log(entry);
      if (pending instanceof Promise) {
        pending.catch((err: unknown) => {
          console.error(`[${transport.name}] log transport failed: ${String(err)}`);
        });
      }
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log("TRACE", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("DEBUG", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("INFO", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("WARN", message, context);
  }

  /**
   * Log an error message with optional Error object.
   * @param error - Error object, or the context when there is no error
   * @param context - Context when an error is given
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("ERROR", message, context, error);
    } else {
      this.log("ERROR", message, isRecord(error) ? error : context);
    }
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("FATAL", message, context, error);
    } else {
      this.log("FATAL", message, isRecord(error) ? error : context);
    }
  }
}

/**
 * Create a new Logger instance with the specified configuration.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: 'rpc-client', level: 'DEBUG', pretty: true });
 * ```
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config);
}

/**
 * Default logger instance. Level comes from LOG_LEVEL.
 */
export const logger = createLogger();

/**
 * Log an error of unknown type.
 *
 * @example
 * ```typescript
 * try {
 *   await client.call('add', 1, 2);
 * } catch (error) {
 *   logError(logger, error, 'Call failed', { function: 'add' });
 * }
 * ```
 */
export function logError(
  log: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  if (error instanceof Error) {
    log.error(message, error, context);
  } else {
    log.error(message, { error: String(error), ...context });
  }
}
