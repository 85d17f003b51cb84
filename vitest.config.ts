import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/*/test/**/*.test.ts"],
    environment: "node",
    pool: "threads",
    env: {
      USE_INMEMORY_STORE: "true",
      LOG_LEVEL: "silent"
    }
  }
});
