import { object } from "@optique/core/constructs";
import { constant } from "@optique/core/primitives";
import {
  ExecutionError,
  FunctionNotFoundError,
  type RpcClient,
  type RpcValue,
} from "@sockrpc/client";
import { endpointArgs, type ClientFactory } from "../endpoint.js";
import { formatCall, formatValue, type Output } from "../output.js";

export const demoCommand = object({
  cmd: constant("demo" as const),
  ...endpointArgs,
});

type ExpectedError = typeof FunctionNotFoundError | typeof ExecutionError;

async function show(
  client: RpcClient,
  out: Output,
  name: string,
  ...args: RpcValue[]
): Promise<void> {
  const result = await client.call(name, ...args);
  out.log(`${formatCall(name, args)} = ${formatValue(result)}`);
}

async function expectFailure(
  client: RpcClient,
  out: Output,
  expected: ExpectedError,
  name: string,
  ...args: RpcValue[]
): Promise<void> {
  try {
    const result = await client.call(name, ...args);
    out.log(`${formatCall(name, args)} = ${formatValue(result)} (expected ${expected.name})`);
  } catch (error) {
    if (!(error instanceof expected)) throw error;
    out.log(`Expected error: ${error.message}`);
  }
}

/**
 * Run the fixed demo sequence on one connection
 */
export async function runDemo(createClient: ClientFactory, out: Output): Promise<void> {
  await createClient().use(async (client) => {
    await show(client, out, "add", 10, 5);
    await show(client, out, "greet", "World");
    await show(client, out, "is_positive", -2.5);
    await show(client, out, "echo", "This is a test string.");
    await show(client, out, "no_return");

    await expectFailure(client, out, FunctionNotFoundError, "nonexistent_function", 1, 2, 3);
    await expectFailure(client, out, ExecutionError, "divide", 10, 0);

    out.log("");
    out.log("--- Complex Types ---");
    await show(client, out, "sum_array", [1, 2, 3, 4, 5, -1]);
    await show(client, out, "process_person", { name: "Alice", age: 30, is_student: false });
    await show(client, out, "get_greetings", ["Bob", "Charlie"]);
  });
}
