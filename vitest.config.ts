import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],

    // Polling tests use real timers with short intervals
    testTimeout: 15000,
    hookTimeout: 10000,

    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
    },
  },
});
