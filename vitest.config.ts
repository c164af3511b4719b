import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@hopshell/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
    },
  },
  test: {
    globals: false,
    include: ["packages/*/test/**/*.test.ts"],
    setupFiles: ["packages/core/test/setup.ts"],
    environment: "node",
  },
});
