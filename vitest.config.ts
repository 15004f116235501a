import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    restoreMocks: true,
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/**/index.ts", "src/**/types.ts"],
      thresholds: { statements: 90, branches: 80, functions: 85, lines: 90 },
    },
    testTimeout: 10_000,
  },
});
