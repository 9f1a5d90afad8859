/**
 * @sockrpc/core - Transports
 * Log transport implementations
 */

export type { LogTransport } from "./types.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./console.js";

export { MemoryTransport } from "./memory.js";
