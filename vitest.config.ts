import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["packages/*/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
    testTimeout: 10000,
    hookTimeout: 10000,
  },
})
