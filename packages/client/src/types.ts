/**
 * @sockrpc/client - Type Definitions
 */

import type { Logger } from "@sockrpc/core";

// ============================================================================
// VALUES
// ============================================================================

/**
 * Any value that has a JSON representation: arguments and results.
 * Numbers must be finite.
 */
export type RpcValue =
  | null
  | boolean
  | number
  | string
  | RpcValue[]
  | { [key: string]: RpcValue };

/**
 * Result of a call. `undefined` means the server sent no result at all,
 * which is distinct from an explicit `null` result.
 */
export type RpcResult = RpcValue | undefined;

// ============================================================================
// STATE
// ============================================================================

/** Connection lifecycle state */
export type ConnectionState = "disconnected" | "connected";

/** I/O phase named by connection errors */
export type ConnectionPhase = "connect" | "send" | "recv";

/** Where a call currently is */
export type CallState = "idle" | "sending" | "awaiting" | "decoding";

// ============================================================================
// OPTIONS
// ============================================================================

/**
 * Options for creating an RPC client.
 */
export interface RpcClientOptions {
  /** Server hostname or IP address */
  host: string;
  /** Server port */
  port: number;
  /** Deadline for one call's send and receive, in ms (default: none) */
  timeout?: number | undefined;
  /** Deadline for establishing the connection, in ms (default: none) */
  connectTimeout?: number | undefined;
  /** Largest response body accepted, in bytes (default: unbounded) */
  maxFrameSize?: number | undefined;
  /** How many calls may wait behind the one in flight (default: unbounded) */
  maxQueuedCalls?: number | undefined;
  /** Logger for connection and call events */
  logger?: Logger | undefined;
}
