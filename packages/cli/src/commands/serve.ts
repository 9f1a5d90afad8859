import { object } from "@optique/core/constructs";
import { withDefault } from "@optique/core/modifiers";
import { constant, option } from "@optique/core/primitives";
import { integer, string } from "@optique/core/valueparser";
import { message } from "@optique/core/message";
import { createReferenceServer, type ReferenceServer } from "@sockrpc/client/testing";
import type { Logger } from "@sockrpc/core";
import type { Output } from "../output.js";

export const serveCommand = object({
  cmd: constant("serve" as const),
  host: withDefault(
    option("--host", string({ metavar: "HOST" }), { description: message`Address to bind` }),
    "127.0.0.1"
  ),
  port: withDefault(
    option("--port", integer({ min: 0, max: 65535, metavar: "PORT" }), {
      description: message`Port to listen on (0 picks a free one)`,
    }),
    9000
  ),
});

/**
 * Start the reference server with the demo functions
 */
export async function startServe(
  opts: { host: string; port: number },
  out: Output,
  logger: Logger
): Promise<ReferenceServer> {
  const server = createReferenceServer({ logger });
  const address = await server.listen(opts.port, opts.host);
  out.log(`Listening on ${address.host}:${address.port}`);
  return server;
}
