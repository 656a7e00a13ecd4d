import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages export their built output; tests run against the sources
const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    alias: {
      "@reimport/engine": source("./packages/engine/src/index.ts"),
      "@reimport/cli": source("./packages/cli/src/index.ts"),
    },
  },
});
