import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@zipmap/pmap",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
