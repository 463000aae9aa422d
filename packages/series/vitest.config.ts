import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@powser/series",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
