import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    testTimeout: 20000,
    coverage: {
      provider: "v8",
      include: [
        "src/core/**/*.ts",
        "src/inventory/**/*.ts",
        "src/notify/**/*.ts",
        "src/utils/**/*.ts"
      ]
    }
  }
});
