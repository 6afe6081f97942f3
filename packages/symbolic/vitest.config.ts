import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@symcalc/symbolic",
    globals: true,
    environment: "node",
  },
});
