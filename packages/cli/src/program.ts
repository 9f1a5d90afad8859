/**
 * @sockrpc/cli - Program
 * Command parser and dispatch, kept apart from the process entry point
 */

import { or } from "@optique/core/constructs";
import { command } from "@optique/core/primitives";
import { message } from "@optique/core/message";
import type { InferValue } from "@optique/core/parser";
import { createLogger, type Logger } from "@sockrpc/core";

import { benchCommand, runBench } from "./commands/bench.js";
import { checkCommand, runChecks } from "./commands/check.js";
import { demoCommand, runDemo } from "./commands/demo.js";
import { serveCommand, startServe } from "./commands/serve.js";
import { clientFactory } from "./endpoint.js";
import type { Output } from "./output.js";

export const program = or(
  command("demo", demoCommand, { description: message`Run the demo call sequence` }),
  command("check", checkCommand, { description: message`Run the protocol check suite` }),
  command("bench", benchCommand, { description: message`Measure call latency` }),
  command("serve", serveCommand, { description: message`Start the reference server` }),
);

export type ParsedCommand = InferValue<typeof program>;

export interface ProgramContext {
  out: Output;
  logger?: Logger | undefined;
}

/**
 * Run a parsed command. Resolves with the process exit code.
 */
export async function dispatch(parsed: ParsedCommand, context: ProgramContext): Promise<number> {
  const logger = context.logger ?? createLogger({ name: "sockrpc-cli" });

  switch (parsed.cmd) {
    case "demo":
      await runDemo(clientFactory(parsed, logger), context.out);
      return 0;
    case "check": {
      const report = await runChecks(clientFactory(parsed, logger), context.out);
      return report.failed > 0 ? 1 : 0;
    }
    case "bench":
      await runBench(clientFactory(parsed, logger), context.out, {
        iterations: parsed.iterations,
        warmup: parsed.warmup,
      });
      return 0;
    case "serve":
      await startServe(parsed, context.out, logger);
      return 0;
  }
}
