/**
 * @sockrpc/core - Console Transport
 *
 * Default log transport that outputs to the console.
 * Pretty, colored output for development and JSON lines otherwise.
 */

import { isDevelopment } from "../env.js";
import type { LogEntry, LogLevelName } from "../logger.js";
import type { LogTransport } from "./types.js";

/**
 * Console transport options
 */
export interface ConsoleTransportOptions {
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Enable ANSI colors (default: when stdout is a TTY) */
  colors?: boolean;
}

const LEVEL_COLORS: Record<LogLevelName, string> = {
  TRACE: "\x1b[90m", // Gray
  DEBUG: "\x1b[36m", // Cyan
  INFO: "\x1b[32m", // Green
  WARN: "\x1b[33m", // Yellow
  ERROR: "\x1b[31m", // Red
  FATAL: "\x1b[35m", // Magenta
  SILENT: "",
};

const RESET = "\x1b[0m";

/**
 * Console transport
 */
export class ConsoleTransport implements LogTransport {
  readonly name = "console";

  private readonly pretty: boolean;
  private readonly colors: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.pretty = options.pretty ?? isDevelopment();
    this.colors = options.colors ?? process.stdout.isTTY === true;
  }

  log(entry: LogEntry): void {
    if (this.pretty) {
      this.logPretty(entry);
    } else {
      this.logJson(entry);
    }
  }

  /** Render an entry as a single JSON line */
  formatJson(entry: LogEntry): string {
    const { level, message, timestamp, context, error } = entry;

    const output: Record<string, unknown> = {
      level,
      time: timestamp,
      msg: message,
    };

    if (context && Object.keys(context).length > 0) {
      Object.assign(output, context);
    }

    if (error) {
      output["err"] = error;
    }

    return JSON.stringify(output);
  }

  /** Render an entry as a human-readable line */
  formatPretty(entry: LogEntry): string {
    const { level, message, timestamp, context } = entry;

    const color = this.colors ? LEVEL_COLORS[level] : "";
    const resetCode = this.colors ? RESET : "";

    // Time part of the ISO timestamp
    const timePart = timestamp.split("T")[1];
    const time = timePart ? timePart.slice(0, 8) : timestamp;

    let output = `${color}[${time}] ${level.padEnd(5)}${resetCode} ${message}`;

    if (context && Object.keys(context).length > 0) {
      output += ` ${JSON.stringify(context)}`;
    }

    return output;
  }

  private logJson(entry: LogEntry): void {
    console.log(this.formatJson(entry));
  }

  private logPretty(entry: LogEntry): void {
    const output = this.formatPretty(entry);
    const { level, error } = entry;

    if (level === "ERROR" || level === "FATAL") {
      console.error(output);
      if (error?.stack) {
        console.error(error.stack);
      }
    } else if (level === "WARN") {
      console.warn(output);
    } else if (level === "DEBUG" || level === "TRACE") {
      console.debug(output);
    } else {
      console.log(output);
    }
  }
}
