import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import { defineConfig } from "vitest/config";

const here = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    testTimeout: 20000,
  },
  resolve: {
    alias: {
      "@vbench/utils": resolve(here, "packages/utils/src/index.ts"),
      "@vbench/trace-format": resolve(here, "packages/trace-format/src/index.ts"),
      "@vbench/trace-export": resolve(here, "packages/trace-export/src/index.ts"),
      "@vbench/harness": resolve(here, "packages/harness/src/index.ts"),
    },
  },
});
