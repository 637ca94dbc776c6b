import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // better-sqlite3 is a native addon; keep each file in its own process
    pool: "forks",
    env: {
      NODE_ENV: "test",
      DB_PATH: ":memory:",
      LOG_LEVEL: "silent",
      SESSION_SECRET: "test-secret-for-cookie-signing",
      SESSION_STORE: "sqlite",
      DELETE_POLICY: "orphan",
      SEED_DATA: "false",
    },
  },
});
