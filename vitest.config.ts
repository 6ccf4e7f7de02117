import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    passWithNoTests: true,
    clearMocks: true,
    restoreMocks: true,
    mockReset: true,
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
    coverage: {
      enabled: true,
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "**/__tests__/**",
        "**/dev/**",
        "**/*.test.*",
        "**/*.spec.*",
        "**/dist/**",
        "**/node_modules/**",
      ],
    },
  },
})
