import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      ISSUE_GRAPH_LOG_LEVEL: "error",
    },
  },
});
