import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    // PGlite boots a full Postgres in-process; the first migration pass can be slow.
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
        "src/test/**",
        // Process entrypoint and lazy wiring (no logic beyond construction)
        "src/index.ts",
        "src/instance/services.ts",
        // Barrel re-export files
        "src/audit/index.ts",
        "src/instance/index.ts",
        "src/security/index.ts",
        "src/policy/index.ts",
      ],
    },
  },
});
