import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    testTimeout: 30000,
    env: {
      NODE_ENV: "production",
      LOG_LEVEL: "silent",
    },
  },
})
