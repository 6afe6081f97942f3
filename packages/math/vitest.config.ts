import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@symcalc/math",
    globals: true,
    environment: "node",
  },
});
