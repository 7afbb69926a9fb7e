import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      SCAN_STATS_LOG_LEVEL: "silent",
    },
  },
});
