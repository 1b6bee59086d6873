import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/unit/**/*.test.ts", "tests/integration/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
    env: {
      LOG_LEVEL: "silent",
      NODE_ENV: "test",
    },
  },
});
