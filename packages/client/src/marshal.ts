/**
 * @sockrpc/client - Marshaling
 * Request encoding and response decoding
 */

import { errorMessage } from "@sockrpc/core";
import {
  rpcResponse,
  safeValidate,
  SUCCESS_STATUS,
  UNKNOWN_ERROR_MESSAGE,
  type RpcRequestEnvelope,
  type RpcResponseEnvelope,
} from "@sockrpc/types";
import { MarshalingError, ProtocolError, classifyServerError } from "./errors.js";
import type { RpcResult, RpcValue } from "./types.js";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

// ============================================================================
// VALUE MODEL
// ============================================================================

/**
 * Find the first part of `value` that JSON cannot represent faithfully.
 * Returns a description of the problem, or null when the value is fine.
 */
export function findUnrepresentable(
  value: unknown,
  path: string = "value",
  ancestors: readonly object[] = []
): string | null {
  switch (typeof value) {
    case "string":
    case "boolean":
      return null;

    case "number":
      return Number.isFinite(value) ? null : `${path}: ${String(value)} is not a finite number`;

    case "object": {
      if (value === null) return null;
      if (ancestors.includes(value)) {
        return `${path}: circular reference`;
      }
      const lineage = [...ancestors, value];

      if (Array.isArray(value)) {
        for (let i = 0; i < value.length; i++) {
          const problem = findUnrepresentable(value[i], `${path}[${i}]`, lineage);
          if (problem) return problem;
        }
        return null;
      }

      const proto: unknown = Object.getPrototypeOf(value);
      if (proto !== Object.prototype && proto !== null) {
        return `${path}: ${describeInstance(proto)} is not a plain object`;
      }

      for (const [key, item] of Object.entries(value)) {
        const problem = findUnrepresentable(item, `${path}.${key}`, lineage);
        if (problem) return problem;
      }
      return null;
    }

    default:
      return `${path}: ${typeof value} has no JSON representation`;
  }
}

function describeInstance(proto: unknown): string {
  if (typeof proto === "object" && proto !== null && "constructor" in proto) {
    const ctor = proto.constructor;
    if (typeof ctor === "function" && ctor.name) {
      return ctor.name;
    }
  }
  return "object";
}

/**
 * Type guard for values inside the JSON value model
 */
export function isRpcValue(value: unknown): value is RpcValue {
  return findUnrepresentable(value) === null;
}

/**
 * Type guard for values decoded from a response. Number literals beyond the
 * double range decode to +/-Infinity and are returned as they are.
 */
function isDecodedValue(value: unknown): value is RpcValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
    case "number":
      return true;
    case "object":
      return Array.isArray(value)
        ? value.every(isDecodedValue)
        : Object.values(value).every(isDecodedValue);
    default:
      return false;
  }
}

// ============================================================================
// REQUESTS
// ============================================================================

/**
 * Build the request envelope and encode it as UTF-8 JSON.
 * Throws {@link MarshalingError} before anything touches the network.
 */
export function marshalRequest(name: string, args: readonly unknown[]): Buffer {
  for (let i = 0; i < args.length; i++) {
    const problem = findUnrepresentable(args[i], `args[${i}]`);
    if (problem) {
      throw new MarshalingError(`Cannot marshal argument ${problem}`, {
        details: { function: name, argument: i },
      });
    }
  }

  const request: Readonly<RpcRequestEnvelope> = Object.freeze({
    function: name,
    args: [...args],
  });

  let text: string;
  try {
    text = JSON.stringify(request);
  } catch (error) {
    throw new MarshalingError(`JSON encoding failed: ${errorMessage(error)}`, { cause: error });
  }

  return Buffer.from(text, "utf8");
}

// ============================================================================
// RESPONSES
// ============================================================================

/**
 * Decode a response body: UTF-8, then JSON, then the envelope shape.
 * Any failure is a {@link ProtocolError}.
 */
export function unmarshalResponse(body: Uint8Array): RpcResponseEnvelope {
  let text: string;
  try {
    text = utf8Decoder.decode(body);
  } catch (error) {
    throw new ProtocolError(`Response is not valid UTF-8: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`Invalid JSON response: ${errorMessage(error)}`, { cause: error });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ProtocolError("Response is not a JSON object");
  }

  const result = safeValidate(rpcResponse, parsed);
  if (!result.success) {
    throw new ProtocolError(`Malformed response: ${result.errors.join("; ")}`, {
      details: { errors: result.errors },
    });
  }

  return result.data;
}

/**
 * Turn a decoded response into the call's outcome: the result on success,
 * otherwise the classified error is thrown.
 */
export function interpretResponse(response: RpcResponseEnvelope): RpcResult {
  if (response.status === SUCCESS_STATUS) {
    const { result } = response;
    if (result === undefined) return undefined;
    if (!isDecodedValue(result)) {
      throw new ProtocolError("Response result is outside the JSON value model");
    }
    return result;
  }

  throw classifyServerError(response.message ?? UNKNOWN_ERROR_MESSAGE);
}
