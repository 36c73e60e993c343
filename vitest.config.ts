import { defineConfig } from "vitest/config";

export default defineConfig({
  // Tests must not pick up a developer's `.env`.
  envDir: ".vitest-env",
  test: {
    globals: true,
    // Threads instead of forks; some sandboxes restrict killing child processes.
    pool: "threads",
    include: ["packages/*/src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
});
