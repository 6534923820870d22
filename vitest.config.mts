import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.mts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
