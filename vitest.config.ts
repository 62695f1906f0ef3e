import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // Scheduler and loop-limit tests drive long virtual timelines.
    testTimeout: 20_000,
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
