import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["releasectl/test/**/*.test.ts"],
    exclude: ["node_modules/**", "**/dist/**"],
    testTimeout: 15000,
  },
});
