import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@coordmap/math",
    globals: true,
    environment: "node",
  },
});
