import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lineshape/capture",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
