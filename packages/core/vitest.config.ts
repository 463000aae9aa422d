import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@powser/core",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
