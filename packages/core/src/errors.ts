/**
 * @module
 * Base error classes shared by every sockrpc package.
 *
 * @example
 * ```typescript
 * import { SockRpcError, ValidationError } from '@sockrpc/core';
 *
 * throw new SockRpcError('Something went wrong', 'CUSTOM_ERROR', { extra: 'info' });
 * throw new ValidationError('Invalid options', [{ field: 'port', message: 'must be an integer' }]);
 * ```
 */

/**
 * Base error class for all sockrpc errors.
 * Carries a machine-readable code and optional details.
 */
export class SockRpcError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SockRpcError";
    this.code = code;
    this.details = details ?? undefined;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    details: Record<string, unknown> | undefined;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

/** Options or input failed validation */
export class ValidationError extends SockRpcError {
  constructor(
    message: string = "Validation failed",
    public readonly errors: ValidationErrorDetail[],
    details?: Record<string, unknown>
  ) {
    super(message, "VALIDATION_ERROR", { ...details, errors });
    this.name = "ValidationError";
  }
}

/** Details about a single validation error */
export interface ValidationErrorDetail {
  /** Field path that failed validation */
  field: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Render an unknown thrown value as text.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
