import { isDeepStrictEqual } from "node:util";
import { object } from "@optique/core/constructs";
import { constant } from "@optique/core/primitives";
import {
  ConnectionError,
  ExecutionError,
  FunctionNotFoundError,
  type RpcClient,
  type RpcResult,
  type RpcValue,
} from "@sockrpc/client";
import { errorMessage } from "@sockrpc/core";
import { endpointArgs, type ClientFactory } from "../endpoint.js";
import { formatValue, type Output } from "../output.js";

export const checkCommand = object({
  cmd: constant("check" as const),
  ...endpointArgs,
});

// ============================================================================
// CHECKS
// ============================================================================

export interface Check {
  name: string;
  run: (client: RpcClient) => Promise<void>;
}

export interface CheckGroup {
  title: string;
  /** Group manages its own connection instead of running inside `use` */
  standalone?: boolean;
  checks: Check[];
}

class CheckFailed extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CheckFailed";
  }
}

function expectResult(actual: RpcResult, expected: RpcResult, call: string): void {
  if (!isDeepStrictEqual(actual, expected)) {
    throw new CheckFailed(`${call} returned ${formatValue(actual)}, expected ${formatValue(expected)}`);
  }
}

async function expectReturns(
  client: RpcClient,
  expected: RpcResult,
  name: string,
  ...args: RpcValue[]
): Promise<void> {
  expectResult(await client.call(name, ...args), expected, name);
}

async function expectRejects(
  promise: Promise<unknown>,
  expected: typeof FunctionNotFoundError | typeof ExecutionError | typeof ConnectionError
): Promise<void> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof expected) return;
    const kind = error instanceof Error ? error.name : typeof error;
    throw new CheckFailed(`expected ${expected.name}, got ${kind}: ${errorMessage(error)}`);
  }
  throw new CheckFailed(`expected ${expected.name}, but the call succeeded`);
}

export const checkGroups: CheckGroup[] = [
  {
    title: "Basic Functionality",
    checks: [
      { name: "Integer addition", run: (c) => expectReturns(c, 100, "add", 42, 58) },
      { name: "String operation", run: (c) => expectReturns(c, "Hello, World!", "greet", "World") },
      {
        name: "Boolean return",
        run: async (c) => {
          await expectReturns(c, true, "is_positive", 5);
          await expectReturns(c, false, "is_positive", -5);
        },
      },
      {
        name: "Void function",
        run: async (c) => {
          const result = await c.call("no_return");
          // servers may send null or omit the result
          if (result !== null && result !== undefined) {
            throw new CheckFailed(`no_return returned ${formatValue(result)}, expected nothing`);
          }
        },
      },
    ],
  },
  {
    title: "Argument Validation",
    checks: [
      {
        name: "Too many arguments rejected",
        run: (c) => expectRejects(c.call("add", 1, 2, 3, 4, 5), ExecutionError),
      },
      { name: "Missing arguments rejected", run: (c) => expectRejects(c.call("add"), ExecutionError) },
      {
        name: "Wrong argument types rejected",
        run: (c) => expectRejects(c.call("add", "string", true), ExecutionError),
      },
      {
        name: "Negative value for is_positive",
        run: (c) => expectReturns(c, false, "is_positive", -10),
      },
      {
        name: "Float arguments for add handled",
        run: async (c) => {
          try {
            await c.call("add", 1.5, 2.5);
          } catch (error) {
            // converting or rejecting are both acceptable
            if (!(error instanceof ExecutionError)) throw error;
          }
        },
      },
    ],
  },
  {
    title: "Error Handling",
    checks: [
      {
        name: "Unknown function raises FunctionNotFoundError",
        run: (c) => expectRejects(c.call("non_existent_function"), FunctionNotFoundError),
      },
      {
        name: "Invalid argument raises ExecutionError",
        run: (c) => expectRejects(c.call("add", "not_a_number", 5), ExecutionError),
      },
      {
        name: "Division by zero raises ExecutionError",
        run: (c) => expectRejects(c.call("divide", 10, 0), ExecutionError),
      },
    ],
  },
  {
    title: "Reconnection",
    standalone: true,
    checks: [
      {
        name: "Reconnect after disconnect",
        run: async (c) => {
          await c.connect();
          try {
            await expectReturns(c, 12, "add", 5, 7);
            c.disconnect();
            await expectRejects(c.call("add", 1, 2), ConnectionError);
            await c.connect();
            await expectReturns(c, 30, "add", 10, 20);
          } finally {
            c.disconnect();
          }
        },
      },
    ],
  },
  {
    title: "Complex Data",
    checks: [
      {
        name: "Array handling",
        run: (c) => expectReturns(c, 15, "sum_array", [1, 2, 3, 4, 5]),
      },
      {
        name: "Object handling",
        run: async (c) => {
          const result = await c.call("process_person", {
            name: "Test User",
            age: 30,
            is_student: true,
          });
          if (typeof result !== "string" || !result.includes("Test User") || !result.includes("30")) {
            throw new CheckFailed(`process_person returned ${formatValue(result)}`);
          }
        },
      },
      {
        name: "Complex return handling",
        run: async (c) => {
          const result = await c.call("get_greetings", ["Alice", "Bob", "Charlie"]);
          if (!Array.isArray(result) || result.length !== 3 || !result.includes("Hello, Alice!")) {
            throw new CheckFailed(`get_greetings returned ${formatValue(result)}`);
          }
        },
      },
    ],
  },
];

// ============================================================================
// RUNNER
// ============================================================================

export interface CheckReport {
  passed: number;
  failed: number;
}

async function runCheck(
  check: Check,
  client: RpcClient,
  out: Output,
  report: CheckReport
): Promise<void> {
  try {
    await check.run(client);
    report.passed++;
    out.log(`✓ ${check.name}`);
  } catch (error) {
    if (error instanceof ConnectionError) throw error;
    report.failed++;
    out.log(`✗ ${check.name}: ${errorMessage(error)}`);
  }
}

/**
 * Run every check group and print one line per check.
 * Connection failures abort the run; everything else counts as a failed check.
 */
export async function runChecks(
  createClient: ClientFactory,
  out: Output,
  groups: readonly CheckGroup[] = checkGroups
): Promise<CheckReport> {
  const report: CheckReport = { passed: 0, failed: 0 };

  for (const group of groups) {
    out.log("");
    out.log(`=== ${group.title} ===`);

    const client = createClient();
    if (group.standalone) {
      for (const check of group.checks) {
        await runCheck(check, client, out, report);
      }
    } else {
      await client.use(async (connected) => {
        for (const check of group.checks) {
          await runCheck(check, connected, out, report);
        }
      });
    }
  }

  out.log("");
  out.log(`${report.passed} passed, ${report.failed} failed`);
  return report;
}
