import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    // argon2 hashing in fixtures is slow on shared CI runners
    testTimeout: 20_000,
  },
});
