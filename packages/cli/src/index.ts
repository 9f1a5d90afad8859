/**
 * @sockrpc/cli
 * Entry point for the `sockrpc` command
 */

import { run } from "@optique/run";
import { message } from "@optique/core/message";
import { isConnectionError, RpcError } from "@sockrpc/client";
import { consoleOutput } from "./output.js";
import { dispatch, program } from "./program.js";

const parsed = run(program, {
  programName: "sockrpc",
  version: "0.1.0",
  description: message`Client tools for length-prefixed JSON RPC over TCP`,
  help: "both",
});

dispatch(parsed, { out: consoleOutput })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (isConnectionError(err)) {
      console.error(`Connection error: ${err.message}`);
    } else if (err instanceof RpcError) {
      console.error(`RPC error: ${err.message}`);
    } else {
      console.error(err instanceof Error ? err : "Command failed");
    }
    process.exit(1);
  });
