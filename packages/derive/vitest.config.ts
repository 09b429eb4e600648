import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lineshape/derive",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
