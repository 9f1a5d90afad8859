/**
 * @module
 * Client configuration schema.
 *
 * @example
 * ```typescript
 * import { clientConfig, type ClientConfig } from '@sockrpc/types';
 *
 * const config: ClientConfig = {
 *   host: '127.0.0.1',
 *   port: 9000,
 *   timeout: 5000,
 * };
 * ```
 */

import { type } from "arktype";

/** Largest body length a 4-byte length prefix can declare */
export const MAX_FRAME_LENGTH = 0xffffffff;

/** TCP port */
export const port = type("0 <= number.integer <= 65535");

/** Positive duration in milliseconds */
export const durationMs = type("number.integer > 0");

/** Client connection and call settings */
export const clientConfig = type({
  host: "string >= 1",
  port,
  "timeout?": durationMs,
  "connectTimeout?": durationMs,
  "maxFrameSize?": "1 <= number.integer <= 4294967295",
  "maxQueuedCalls?": "number.integer >= 0",
});

export type ClientConfig = typeof clientConfig.infer;
