import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/test-fixtures.ts", "src/cli.ts"],
      reporter: ["text"],
      reportsDirectory: ".coverage",
      thresholds: {
        lines: 90,
      },
    },
  },
});
