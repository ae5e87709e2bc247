import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "html"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        // Type-only files (no executable code)
        "src/types.ts",
        // CLI command handlers (exercised through the command tests)
        "src/commands/index.ts",
      ],
      reportsDirectory: "./coverage",
    },
    testTimeout: 30000,
    // Each test file in its own process so fs mocks never leak across files
    pool: "forks",
    poolOptions: {
      forks: {
        isolate: true,
        singleFork: false,
      },
    },
    teardownTimeout: 5000,
    hookTimeout: 30000,
  },
});
