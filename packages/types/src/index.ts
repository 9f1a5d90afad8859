/**
 * @module
 * Wire and configuration schemas for sockrpc.
 * Uses ArkType for runtime validation with automatic TypeScript type inference.
 *
 * @example
 * ```typescript
 * import { rpcResponse, safeValidate } from '@sockrpc/types';
 *
 * const result = safeValidate(rpcResponse, JSON.parse(body));
 * if (result.success) {
 *   console.log(result.data.status);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */

// Re-export ArkType for convenience
export { type } from "arktype";
export { ArkErrors, type Type } from "arktype";

// ============================================================================
// Wire Schemas & Types
// ============================================================================
export * from "./wire.js";

// ============================================================================
// Config Schemas & Types
// ============================================================================
export * from "./config.js";

// ============================================================================
// Validation Helpers
// ============================================================================

import { ArkErrors } from "arktype";

/**
 * Anything callable like an ArkType schema: returns the validated value or
 * the collected errors.
 */
export type Validator<T> = (data: unknown) => T | ArkErrors;

/**
 * Validate data against an ArkType schema.
 * Returns the validated data or throws an error.
 *
 * @example
 * ```typescript
 * const config = validateWithSchema(clientConfig, input);
 * ```
 */
export function validateWithSchema<T>(schema: Validator<T>, data: unknown): T {
  const result = schema(data);

  if (result instanceof ArkErrors) {
    const errors = result.map((e) => `${String(e.path)}: ${e.message}`).join("\n");
    throw new Error(`Validation failed:\n${errors}`);
  }

  return result;
}

/**
 * Safely validate data against an ArkType schema.
 * Returns a result object instead of throwing.
 *
 * @example
 * ```typescript
 * const result = safeValidate(rpcResponse, input);
 * if (result.success) {
 *   console.log(result.data);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */
export function safeValidate<T>(
  schema: Validator<T>,
  data: unknown
): { success: true; data: T } | { success: false; errors: string[] } {
  const result = schema(data);

  if (result instanceof ArkErrors) {
    return {
      success: false,
      errors: result.map((e) => `${String(e.path) || "root"}: ${e.message}`),
    };
  }

  return {
    success: true,
    data: result,
  };
}

/**
 * Check if data matches an ArkType schema (type guard).
 *
 * @example
 * ```typescript
 * if (isValid(rpcRequest, input)) {
 *   // input is typed as RpcRequestEnvelope
 * }
 * ```
 */
export function isValid<T>(schema: Validator<T>, data: unknown): data is T {
  return !(schema(data) instanceof ArkErrors);
}

/**
 * Map ArkType errors by field path.
 *
 * @example
 * ```typescript
 * const result = clientConfig(input);
 * if (result instanceof ArkErrors) {
 *   const formatted = formatErrors(result);
 *   // { port: "must be an integer (was 1.5)" }
 * }
 * ```
 */
export function formatErrors(errors: ArkErrors): Record<string, string> {
  const formatted: Record<string, string> = {};

  for (const error of errors) {
    const path = String(error.path) || "root";
    formatted[path] = error.message;
  }

  return formatted;
}
