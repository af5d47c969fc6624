import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@coordmap/reference",
    globals: true,
    environment: "node",
  },
});
