import type { RpcResult } from "@sockrpc/client";

/** Line sink the commands print through */
export interface Output {
  log(line: string): void;
}

export const consoleOutput: Output = {
  log(line) {
    console.log(line);
  },
};

/**
 * Render a value the way it travels: JSON, or `undefined` for "no result"
 */
export function formatValue(value: RpcResult): string {
  return value === undefined ? "undefined" : JSON.stringify(value);
}

/** `name(arg, arg)` */
export function formatCall(name: string, args: readonly RpcResult[]): string {
  return `${name}(${args.map(formatValue).join(", ")})`;
}
