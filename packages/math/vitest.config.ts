import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@powser/math",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
