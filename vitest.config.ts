import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      YOUTUBE_API_KEY: "test-key",
      CACHE_DRIVER: "memory",
      LOG_LEVEL: "error",
      LOG_TO_FILE: "false",
    },
  },
});
