import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // DuckDB loads a native binding; forks keep it out of worker threads
    pool: "forks",
  },
});
