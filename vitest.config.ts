import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // workspace package; its exports point at dist/ for node, sources here
      "@tasktrack/cli": fileURLToPath(new URL("./task-cli/src/lib.ts", import.meta.url)),
    },
  },
  test: {
    include: ["task-cli/src/**/*.test.ts", "task-mcp/src/**/*.test.ts"],
  },
});
