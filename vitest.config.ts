import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      LOG_LEVEL: "silent",
      LOG_FORMAT: "json",
    },
  },
});
