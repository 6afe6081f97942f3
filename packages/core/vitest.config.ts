import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@symcalc/core",
    globals: true,
    environment: "node",
  },
});
