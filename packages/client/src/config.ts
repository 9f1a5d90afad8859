/**
 * @sockrpc/client - Configuration
 * Option validation, defaults and environment loading
 */

import { ArkErrors, clientConfig } from "@sockrpc/types";
import { createEnvConfig, createLogger, ValidationError, type Logger } from "@sockrpc/core";
import type { RpcClientOptions } from "./types.js";

// ============================================================================
// DEFAULTS
// ============================================================================

/** Logger name used when no logger is passed */
export const DEFAULT_LOGGER_NAME = "sockrpc-client";

/** Host used when SOCKRPC_HOST is unset */
export const DEFAULT_HOST = "127.0.0.1";

/** Port used when SOCKRPC_PORT is unset */
export const DEFAULT_PORT = 9000;

/**
 * Client options after validation, with every default applied
 */
export interface ResolvedClientOptions {
  host: string;
  port: number;
  timeout: number | undefined;
  connectTimeout: number | undefined;
  maxFrameSize: number | undefined;
  maxQueuedCalls: number | undefined;
  logger: Logger;
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Validate client options and fill in defaults.
 * Throws {@link ValidationError} listing every bad field.
 */
export function resolveClientOptions(options: RpcClientOptions): ResolvedClientOptions {
  const { logger, ...settings } = options;

  // explicit undefined means "not set"
  const defined = Object.fromEntries(
    Object.entries(settings).filter(([, value]) => value !== undefined)
  );

  const config = clientConfig(defined);
  if (config instanceof ArkErrors) {
    throw new ValidationError(
      "Invalid client options",
      config.map((error) => ({
        field: String(error.path) || "root",
        message: error.message,
      }))
    );
  }

  return {
    host: config.host,
    port: config.port,
    timeout: config.timeout,
    connectTimeout: config.connectTimeout,
    maxFrameSize: config.maxFrameSize,
    maxQueuedCalls: config.maxQueuedCalls,
    logger: logger ?? createLogger({ name: DEFAULT_LOGGER_NAME }),
  };
}

/**
 * Read client options from the environment.
 *
 * | Variable | Option |
 * |---|---|
 * | `SOCKRPC_HOST` | `host` (default `127.0.0.1`) |
 * | `SOCKRPC_PORT` | `port` (default `9000`) |
 * | `SOCKRPC_TIMEOUT` | `timeout` |
 * | `SOCKRPC_CONNECT_TIMEOUT` | `connectTimeout` |
 * | `SOCKRPC_MAX_FRAME_SIZE` | `maxFrameSize` |
 *
 * Values in `overrides` win over the environment.
 */
export function clientOptionsFromEnv(overrides: Partial<RpcClientOptions> = {}): RpcClientOptions {
  const env = createEnvConfig({
    SOCKRPC_HOST: { default: DEFAULT_HOST },
    SOCKRPC_PORT: { type: "number", default: DEFAULT_PORT },
    SOCKRPC_TIMEOUT: { type: "number" },
    SOCKRPC_CONNECT_TIMEOUT: { type: "number" },
    SOCKRPC_MAX_FRAME_SIZE: { type: "number" },
  });

  return {
    // an empty SOCKRPC_HOST counts as unset
    host: overrides.host ?? (env.SOCKRPC_HOST || DEFAULT_HOST),
    port: overrides.port ?? env.SOCKRPC_PORT ?? DEFAULT_PORT,
    timeout: overrides.timeout ?? env.SOCKRPC_TIMEOUT,
    connectTimeout: overrides.connectTimeout ?? env.SOCKRPC_CONNECT_TIMEOUT,
    maxFrameSize: overrides.maxFrameSize ?? env.SOCKRPC_MAX_FRAME_SIZE,
    maxQueuedCalls: overrides.maxQueuedCalls,
    logger: overrides.logger,
  };
}
