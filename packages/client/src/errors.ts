/**
 * @sockrpc/client - RPC Errors
 *
 * Every failure a call can end in. All of them extend {@link RpcError}, so
 * `catch (e) { if (e instanceof RpcError) ... }` catches the whole family.
 */

import { SockRpcError, errorMessage } from "@sockrpc/core";
import type { ConnectionPhase } from "./types.js";

/** Substring that marks an unknown-function error message */
export const FUNCTION_NOT_FOUND_MARKER = "Function not found";

/** Substring that marks a server-side execution error message */
export const EXECUTION_ERROR_MARKER = "Execution error";

interface RpcErrorOptions {
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base RPC error. Also used as-is for server errors that match no more
 * specific kind.
 */
export class RpcError extends SockRpcError {
  public readonly retryable: boolean;

  constructor(message: string, code: string = "RPC_ERROR", options?: RpcErrorOptions) {
    super(message, code, options?.details, { cause: options?.cause });
    this.name = "RpcError";
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * The socket is not open, or failed while connecting, sending or receiving.
 * The connection is always disconnected by the time this is thrown.
 */
export class ConnectionError extends RpcError {
  public readonly phase: ConnectionPhase | undefined;

  constructor(message: string, options?: { phase?: ConnectionPhase; cause?: unknown }) {
    const details: Record<string, unknown> = {};
    if (options?.phase) {
      details["phase"] = options.phase;
    }
    super(message, "CONNECTION_ERROR", {
      retryable: true,
      details,
      cause: options?.cause,
    });
    this.name = "ConnectionError";
    this.phase = options?.phase;
  }

  /**
   * Wrap a low-level socket fault
   */
  static fromSocketError(phase: ConnectionPhase, error: unknown): ConnectionError {
    return new ConnectionError(`Socket error during ${phase}: ${errorMessage(error)}`, {
      phase,
      cause: error,
    });
  }
}

/**
 * A request could not be encoded. Raised before any I/O.
 */
export class MarshalingError extends RpcError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, "MARSHALING_ERROR", { retryable: false, ...options });
    this.name = "MarshalingError";
  }
}

/**
 * The server sent something that is not a valid response.
 */
export class ProtocolError extends RpcError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, "PROTOCOL_ERROR", { retryable: false, ...options });
    this.name = "ProtocolError";
  }
}

/**
 * The server has no function with the requested name.
 */
export class FunctionNotFoundError extends RpcError {
  constructor(message: string) {
    super(message, "FUNCTION_NOT_FOUND", { retryable: false });
    this.name = "FunctionNotFoundError";
  }
}

/**
 * The function exists but failed on the server (bad arguments, runtime fault).
 */
export class ExecutionError extends RpcError {
  constructor(message: string) {
    super(message, "EXECUTION_ERROR", { retryable: false });
    this.name = "ExecutionError";
  }
}

/**
 * Map a server error message onto an error kind.
 *
 * Servers carry no error code, only prose, so this matches substrings.
 * An unrelated message that happens to contain a marker is misclassified;
 * existing servers depend on this exact rule.
 */
export function classifyServerError(message: string): RpcError {
  if (message.includes(FUNCTION_NOT_FOUND_MARKER)) {
    return new FunctionNotFoundError(message);
  }
  if (message.includes(EXECUTION_ERROR_MARKER)) {
    return new ExecutionError(message);
  }
  return new RpcError(message);
}

/**
 * Check whether an error means the connection is gone
 */
export function isConnectionError(error: unknown): error is ConnectionError {
  return error instanceof ConnectionError;
}
