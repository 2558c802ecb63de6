import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@rxmacro/core",
    globals: true,
    environment: "node",
  },
});
