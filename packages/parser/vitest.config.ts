import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@symcalc/parser",
    globals: true,
    environment: "node",
  },
});
