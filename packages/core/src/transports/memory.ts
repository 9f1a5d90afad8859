/**
 * @sockrpc/core - Memory Transport
 * Keeps log entries in an array, for tests and for inspecting a session
 */

import type { LogEntry } from "../logger.js";
import type { LogTransport } from "./types.js";

export class MemoryTransport implements LogTransport {
  readonly name = "memory";
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  /** Messages logged so far, in order */
  get messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
