import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["opposition-scraper/src/**/*.test.ts", "summary-api/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
