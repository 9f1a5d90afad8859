/**
 * @module
 * Wire envelope schemas for the length-prefixed JSON RPC protocol.
 *
 * Every frame body is one of these envelopes encoded as UTF-8 JSON:
 *
 * ```json
 * { "function": "add", "args": [10, 5] }
 * { "status": "success", "result": 15 }
 * { "status": "error", "message": "Function not found" }
 * ```
 */

import { type } from "arktype";

// ============================================================================
// Status
// ============================================================================

/** Status value of a successful response; anything else is an error */
export const SUCCESS_STATUS = "success";

/** Status value servers send for failures */
export const ERROR_STATUS = "error";

/** Message used when an error response carries none */
export const UNKNOWN_ERROR_MESSAGE = "Unknown error";

// ============================================================================
// Envelopes
// ============================================================================

/** Request body */
export const rpcRequest = type({
  function: "string",
  args: "unknown[]",
});

/**
 * Response body.
 * Every field is optional on the wire. Any status other than "success",
 * missing or not a string, is treated as an error, and a missing result
 * as "no return value".
 */
export const rpcResponse = type({
  "status?": "unknown",
  "result?": "unknown",
  "message?": "string",
});

/** Successful response with a result */
export const rpcSuccessResponse = type({
  status: "'success'",
  "result?": "unknown",
});

/** Error response */
export const rpcErrorResponse = type({
  status: "'error'",
  message: "string",
});

// ============================================================================
// Type Exports
// ============================================================================

export type RpcRequestEnvelope = typeof rpcRequest.infer;
export type RpcResponseEnvelope = typeof rpcResponse.infer;
export type RpcSuccessEnvelope = typeof rpcSuccessResponse.infer;
export type RpcErrorEnvelope = typeof rpcErrorResponse.infer;
