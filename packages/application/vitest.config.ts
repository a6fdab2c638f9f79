import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "application",
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 20_000,
  },
});
