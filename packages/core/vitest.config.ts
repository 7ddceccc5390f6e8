// pattern: Imperative Shell
import { defineConfig, mergeConfig } from "vitest/config";

import workspaceConfig from "../../vitest.config.js";

export default mergeConfig(
  workspaceConfig,
  defineConfig({
    test: {
      // File patterns - only this package's tests
      include: ["src/**/*.{test,spec}.ts"],
      coverage: {
        include: ["src/**/*.ts"],
      },
    },
  })
);
