import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@zipmap/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
