import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    globals: true,
    coverage: {
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        "src/test-helpers.ts",
        "src/types/**",
        "src/index.ts",
        "src/loop/orchestrator.ts",
      ],
    },
  },
});
