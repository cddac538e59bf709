import { defineConfig } from "vitest/config";

/**
 * Vitest configuration for the package.
 * Runs test files in forked processes so Ink's raw-mode stdin stubs never
 * share a worker thread.
 */
export default defineConfig({
  test: {
    pool: "forks",
    environment: "node",
    include: ["tests/**/*.test.ts", "tests/**/*.test.tsx"],
  },
});
