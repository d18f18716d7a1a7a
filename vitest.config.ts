import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      NODE_ENV: "test",
      DEBUG_LOGGING: "false",
      GIT_DOC_MAPPER_LOG_LEVEL: "silent"
    }
  }
});
