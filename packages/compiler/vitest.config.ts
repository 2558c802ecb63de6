import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages export dist/ to Node; tests run against their sources
    alias: {
      "@rxmacro/core": path.resolve(__dirname, "../core/src/index.ts"),
    },
  },
  test: {
    name: "@rxmacro/compiler",
    globals: true,
    environment: "node",
  },
});
