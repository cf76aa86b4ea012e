import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@cmdtok/command",
    globals: true,
    environment: "node",
  },
});
