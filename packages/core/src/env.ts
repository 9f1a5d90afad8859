/**
 * @sockrpc/core - Environment Variables
 * Typed access to process environment variables
 */

/**
 * Get an environment variable value
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

/**
 * Get an environment variable, throwing if not found
 */
export function requireEnv(key: string): string {
  const value = getEnv(key);
  if (value === undefined || value === "") {
    throw new Error(`Required environment variable "${key}" is not set`);
  }
  return value;
}

/**
 * Get an environment variable as a number
 */
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = getEnv(key);
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get an environment variable as a boolean
 */
export function getEnvBoolean(key: string, defaultValue: boolean = false): boolean {
  const value = getEnv(key);
  if (value === undefined || value === "") {
    return defaultValue;
  }
  return value === "true" || value === "1" || value === "yes";
}

/**
 * Check if running in development mode
 */
export function isDevelopment(): boolean {
  const env = getEnv("NODE_ENV");
  return env === "development" || env === undefined;
}

/**
 * Create a typed environment configuration object.
 * Unset variables come back as `undefined` unless a default is given.
 *
 * @example
 * ```typescript
 * const env = createEnvConfig({
 *   SOCKRPC_HOST: { required: true },
 *   SOCKRPC_PORT: { type: 'number', default: 9000 },
 *   SOCKRPC_DEBUG: { type: 'boolean', default: false },
 * });
 *
 * env.SOCKRPC_HOST // string | undefined
 * env.SOCKRPC_PORT // number | undefined
 * env.SOCKRPC_DEBUG // boolean
 * ```
 */
export function createEnvConfig<T extends EnvSchema>(schema: T): EnvResult<T> {
  const result: Record<string, string | number | boolean | undefined> = {};

  for (const [key, config] of Object.entries(schema)) {
    let value: string | number | boolean | undefined;

    switch (config.type) {
      case "number":
        value = getEnvNumber(
          key,
          typeof config.default === "number" ? config.default : undefined
        );
        break;
      case "boolean":
        value = getEnvBoolean(key, typeof config.default === "boolean" ? config.default : false);
        break;
      default:
        value = getEnv(key, typeof config.default === "string" ? config.default : undefined);
    }

    if (config.required && (value === undefined || value === "")) {
      throw new Error(`Required environment variable "${key}" is not set`);
    }

    result[key] = value;
  }

  return result as EnvResult<T>;
}

// Type helpers for createEnvConfig
type EnvConfigItem = {
  type?: "string" | "number" | "boolean";
  required?: boolean;
  default?: string | number | boolean;
};

type EnvSchema = Record<string, EnvConfigItem>;

type EnvResult<T extends EnvSchema> = {
  [K in keyof T]: T[K]["type"] extends "number"
    ? number | undefined
    : T[K]["type"] extends "boolean"
      ? boolean
      : string | undefined;
};
