// vitest.config.ts — Unit and integration test configuration
import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
    testTimeout: 10_000,
  },
})
