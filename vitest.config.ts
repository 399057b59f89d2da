import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["stages/*/src/**/*.test.ts", "config/**/*.test.ts"],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
});
