import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      SERVICE_SECRET: "test-secret",
      DETAIL_FETCH_INTERVAL_MS: "100",
    },
  },
});
