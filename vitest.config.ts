import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      LOG_TO_FILE: "false",
      LOG_LEVEL: "SILENT",
    },
    testTimeout: 10000,
  },
});
