import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "infrastructure",
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 20_000,
  },
});
