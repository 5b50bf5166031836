import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      thresholds: {
        statements: 95,
        branches: 90,
        functions: 100,
        lines: 95,
      },
      all: true,
      include: ["src/**/!(*.test).ts"],
      exclude: ["src/main.ts", "src/test-helpers/**"],
    },
  },
});
