import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lineshape/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
