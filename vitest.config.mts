// vitest.config.mts
//
// Vitest configuration for Decimath.
// - TypeScript-first, Node environment
// - Process-wide precision restored after every test (tests/setupTests.ts)
// - Coverage enabled and tuned for a library

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Use global test functions (describe, it, expect, etc.)
    globals: true,

    environment: "node",

    // Where to look for test files.
    include: ["tests/**/*.spec.ts"],

    exclude: ["node_modules", "dist", "coverage", ".git"],

    setupFiles: ["./tests/setupTests.ts"],

    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "html", "lcov"],

      include: ["src/**/*.ts"],

      exclude: [
        "src/**/*.d.ts",
        "src/index.ts", // re-exports
        "src/bin.ts", // process entry point
      ],

      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },

    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
