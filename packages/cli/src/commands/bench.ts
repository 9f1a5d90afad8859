import { performance } from "node:perf_hooks";
import { object } from "@optique/core/constructs";
import { withDefault } from "@optique/core/modifiers";
import { constant, option } from "@optique/core/primitives";
import { integer } from "@optique/core/valueparser";
import { message } from "@optique/core/message";
import type { RpcValue } from "@sockrpc/client";
import { endpointArgs, type ClientFactory } from "../endpoint.js";
import type { Output } from "../output.js";
import { summarize, type LatencySummary } from "../stats.js";

export const DEFAULT_ITERATIONS = 25;
export const DEFAULT_WARMUP = 10;

export const benchCommand = object({
  cmd: constant("bench" as const),
  ...endpointArgs,
  iterations: withDefault(
    option("--iterations", integer({ min: 1 }), { description: message`Timed calls per case` }),
    DEFAULT_ITERATIONS
  ),
  warmup: withDefault(
    option("--warmup", integer({ min: 0 }), { description: message`Untimed calls before the run` }),
    DEFAULT_WARMUP
  ),
});

export interface BenchCase {
  label: string;
  fn: string;
  args: RpcValue[];
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

export const benchCases: BenchCase[] = [
  { label: "No args/results", fn: "no_return", args: [] },
  { label: "1 arg/result", fn: "is_positive", args: [5] },
  { label: "2 args/1 result", fn: "add", args: [5, 10] },
  { label: "4-byte payload", fn: "echo", args: ["x".repeat(4)] },
  { label: "40-byte payload", fn: "echo", args: ["x".repeat(40)] },
  { label: "100-byte payload", fn: "echo", args: ["x".repeat(100)] },
  { label: "1000-byte payload", fn: "echo", args: ["x".repeat(1000)] },
  { label: "1 word array", fn: "sum_array", args: [[1]] },
  { label: "4 word array", fn: "sum_array", args: [[1, 2, 3, 4]] },
  { label: "10 word array", fn: "sum_array", args: [range(10)] },
  { label: "40 word array", fn: "sum_array", args: [range(40)] },
  { label: "100 word array", fn: "sum_array", args: [range(100)] },
];

export interface BenchOptions {
  iterations: number;
  warmup: number;
  cases?: readonly BenchCase[] | undefined;
}

export interface BenchRow extends LatencySummary {
  label: string;
}

const LABEL_WIDTH = 25;
const COLUMN_WIDTH = 12;

export function formatRow(label: string, cells: readonly string[]): string {
  return label.padEnd(LABEL_WIDTH) + cells.map((cell) => cell.padEnd(COLUMN_WIDTH)).join("").trimEnd();
}

/**
 * Time each case over one connection and print a latency table in ms
 */
export async function runBench(
  createClient: ClientFactory,
  out: Output,
  options: BenchOptions
): Promise<BenchRow[]> {
  const cases = options.cases ?? benchCases;
  const rows: BenchRow[] = [];

  await createClient().use(async (client) => {
    for (let i = 0; i < options.warmup; i++) {
      await client.call("add", 1, 1);
    }

    out.log(formatRow("Test Case", ["Min (ms)", "Median (ms)", "Avg (ms)", "Max (ms)"]));
    out.log("-".repeat(LABEL_WIDTH + COLUMN_WIDTH * 4));

    for (const benchCase of cases) {
      const latencies: number[] = [];
      for (let i = 0; i < options.iterations; i++) {
        const start = performance.now();
        await client.call(benchCase.fn, ...benchCase.args);
        latencies.push(performance.now() - start);
      }

      const row: BenchRow = { label: benchCase.label, ...summarize(latencies) };
      rows.push(row);
      out.log(
        formatRow(
          row.label,
          [row.min, row.median, row.avg, row.max].map((ms) => ms.toFixed(2))
        )
      );
    }
  });

  return rows;
}
