import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    environment: "node",
    // Exact solving of mapped grid graphs is slow for the larger fixtures
    testTimeout: 120_000,
  },
});
