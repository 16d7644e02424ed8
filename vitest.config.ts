// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    // keep pino quiet while tests run
    env: {
      LOG_LEVEL: "silent",
      NODE_ENV: "test",
    },
  },
});
