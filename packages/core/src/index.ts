/**
 * @module
 * Shared utilities for the sockrpc packages: logging, environment access
 * and the base error class.
 *
 * @example
 * ```typescript
 * import { createLogger, getEnvNumber, SockRpcError } from '@sockrpc/core';
 *
 * const log = createLogger({ name: 'rpc-client' });
 * const port = getEnvNumber('SOCKRPC_PORT', 9000);
 * ```
 */

// ============================================
// ENVIRONMENT
// ============================================

export {
  getEnv,
  requireEnv,
  getEnvNumber,
  getEnvBoolean,
  isDevelopment,
  createEnvConfig,
} from "./env.js";

// ============================================
// LOGGING
// ============================================

export {
  Logger,
  LogLevel,
  createLogger,
  logger,
  logError,
  isLogLevelName,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
  type ErrorInfo,
  type LoggerConfig,
} from "./logger.js";

export {
  ConsoleTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type LogTransport,
} from "./transports/index.js";

// ============================================
// ERRORS
// ============================================

export * from "./errors.js";
