import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    mockReset: true,
    // Test timeouts to prevent hanging
    testTimeout: 30000,
    hookTimeout: 10000,
    teardownTimeout: 5000,
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true,
      },
    },
    fileParallelism: false,
    coverage: {
      enabled: false,
      include: ["src/**/*.ts"],
      provider: "v8",
      reporter: ["text", "lcov"],
    },
  },
});
