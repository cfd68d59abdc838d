import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "astro/**/__tests__/**/*.test.ts",
      "logging/**/__tests__/**/*.test.ts",
      "tools/**/__tests__/**/*.test.ts",
    ],
  },
});
