import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    setupFiles: ["./vitest.setup.ts"],
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      NODE_ENV: "test",
      // Keep pino quiet; tests assert on telemetry through setTestSink()
      LOG_LEVEL: "silent",
    },
  },
});
