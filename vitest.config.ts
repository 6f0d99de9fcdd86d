import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["libs/*/src/**/*.test.ts"],
    testTimeout: 5000,
  },
});
