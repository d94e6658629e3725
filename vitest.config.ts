import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "tests/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      // Public surfaces: the gate, its caller, and the CI glue
      include: [
        "src/gate/publish-evaluator.ts",
        "src/service/publish-gate.ts",
        "src/github/event-resolver.ts",
        "src/workflow/renderer.ts",
        "src/events/logger.ts",
      ],
      exclude: [
        "src/**/__tests__/**",
        "src/schemas/**",   // Zod schemas tested via the modules that use them
      ],
    },
  },
});
