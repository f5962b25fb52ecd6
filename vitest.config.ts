import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // PGlite boots a WASM Postgres per test file; the first migration run is slow.
    testTimeout: 30_000,
    hookTimeout: 60_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Process entrypoint: env check and dynamic import only
        "src/index.ts",
        "src/test/**",
        // Pure type-only files (interfaces/types, no runtime logic)
        "src/compute/compute-backend.ts",
      ],
    },
  },
});
