import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/index.ts"],
      thresholds: {
        // Pricing paths should stay fully exercised
        "src/math.ts": {
          statements: 95,
          branches: 85,
          functions: 95,
        },
        "src/market.ts": {
          statements: 95,
          branches: 85,
          functions: 95,
        },
      },
    },
  },
});
