// pattern: Imperative Shell
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test environment
    environment: "node",

    // File patterns
    include: ["packages/**/src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],

    // Coverage configuration
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["packages/**/src/**/*.ts"],
      exclude: [
        "node_modules",
        "dist",
        "**/*.{test,spec}.ts",
        "**/*.d.ts",
        "**/test-utils/**",
      ],
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },

    // Performance and behavior
    testTimeout: 10000,
    hookTimeout: 10000,
    bail: 1,

    // TypeScript support
    globals: false,
    typecheck: {
      checker: "tsc",
    },
  },
});
