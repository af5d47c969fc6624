import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@coordmap/core",
    globals: true,
    environment: "node",
  },
});
