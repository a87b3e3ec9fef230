import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      FRAMECAST_LOG_LEVEL: "silent",
    },
    testTimeout: 20000,
    reporters: ["default"],
  },
});
