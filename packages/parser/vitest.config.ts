import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@cmdtok/parser",
    globals: true,
    environment: "node",
  },
});
