import { optional } from "@optique/core/modifiers";
import { argument, option } from "@optique/core/primitives";
import { integer, string } from "@optique/core/valueparser";
import { message } from "@optique/core/message";
import { createRpcClient, type RpcClient } from "@sockrpc/client";
import type { Logger } from "@sockrpc/core";

/** Where to connect, shared by every client command */
export const endpointArgs = {
  host: argument(string({ metavar: "HOST" }), { description: message`Server host` }),
  port: argument(integer({ min: 0, max: 65535, metavar: "PORT" }), {
    description: message`Server port (0-65535)`,
  }),
  timeout: optional(
    option("--timeout", integer({ min: 1, metavar: "MS" }), {
      description: message`Per-call deadline in milliseconds`,
    })
  ),
};

export interface Endpoint {
  host: string;
  port: number;
  timeout?: number | undefined;
}

/** Builds a fresh, disconnected client per call */
export type ClientFactory = () => RpcClient;

export function clientFactory(endpoint: Endpoint, logger?: Logger): ClientFactory {
  return () =>
    createRpcClient({
      host: endpoint.host,
      port: endpoint.port,
      timeout: endpoint.timeout,
      logger,
    });
}
