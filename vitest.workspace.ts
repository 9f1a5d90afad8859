import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/types",
  "packages/core",
  "packages/client",
  "packages/cli",
]);
