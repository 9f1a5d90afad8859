/**
 * @sockrpc/client
 * Client stub for length-prefixed JSON RPC over TCP
 *
 * @example
 * ```typescript
 * import { withClient, FunctionNotFoundError } from '@sockrpc/client';
 *
 * const sum = await withClient({ host: '127.0.0.1', port: 9000 }, (client) =>
 *   client.call('add', 10, 5)
 * );
 * ```
 */

// ============================================================================
// CLIENT
// ============================================================================

export { RpcClient, createRpcClient, withClient } from "./client.js";

export {
  resolveClientOptions,
  clientOptionsFromEnv,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_LOGGER_NAME,
  type ResolvedClientOptions,
} from "./config.js";

export type {
  RpcValue,
  RpcResult,
  ConnectionState,
  ConnectionPhase,
  CallState,
  RpcClientOptions,
} from "./types.js";

// ============================================================================
// ERRORS
// ============================================================================

export {
  RpcError,
  ConnectionError,
  MarshalingError,
  ProtocolError,
  FunctionNotFoundError,
  ExecutionError,
  classifyServerError,
  isConnectionError,
  FUNCTION_NOT_FOUND_MARKER,
  EXECUTION_ERROR_MARKER,
} from "./errors.js";

export { CallQueue, CallQueueFullError, type CallQueueOptions } from "./call-queue.js";

// ============================================================================
// WIRE
// ============================================================================

export { Connection, type ConnectionOptions } from "./connection.js";

export {
  FRAME_HEADER_SIZE,
  encodeFrame,
  decodeFrameLength,
  sendFrame,
  receiveFrame,
  type FrameSink,
  type FrameSource,
  type ReceiveFrameOptions,
} from "./framing.js";

export {
  marshalRequest,
  unmarshalResponse,
  interpretResponse,
  isRpcValue,
  findUnrepresentable,
} from "./marshal.js";

export { ByteReader } from "./byte-reader.js";

export { TimeoutExceededError, executeWithTimeout } from "./timeout.js";
