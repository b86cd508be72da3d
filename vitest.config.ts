import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["spec/**/*.spec.ts"],
    testTimeout: 10000,
  },
});
