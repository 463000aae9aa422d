import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@powser/std",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
