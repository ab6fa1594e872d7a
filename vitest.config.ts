import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["flowctl/test/**/*.test.ts"],
    environment: "node",
    env: {
      FLOWCTL_LOG_LEVEL: "silent",
    },
    testTimeout: 30000,
  },
});
