import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/**/__tests__/**/*.test.ts"],
    // Config modules are imported through tsx on first use.
    testTimeout: 15_000
  }
});
