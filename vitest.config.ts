import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/*/test/**/*.test.ts"],
    setupFiles: ["services/decision-service/test/setup.ts"],
    pool: "threads"
  }
});
