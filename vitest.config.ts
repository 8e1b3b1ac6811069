import { defineConfig } from "vitest/config";

const isCI = process.env.CI === "true" || process.env.GITHUB_ACTIONS === "true";

export default defineConfig({
  test: {
    testTimeout: 30_000,
    hookTimeout: 30_000,
    pool: "forks",
    maxWorkers: isCI ? 2 : 4,
    include: ["src/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    // Plain console output so assertions see uncoloured lines.
    env: { NO_COLOR: "1", FORCE_COLOR: "0" },
    exclude: ["dist/**", "**/node_modules/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        // Entrypoints and wiring (covered by the program tests and manual runs).
        "src/entry.ts",
        "src/index.ts",
        "src/runtime.ts",
        // Interactive prompts are validated manually.
        "src/wizard/clack-prompter.ts",
      ],
    },
  },
});
