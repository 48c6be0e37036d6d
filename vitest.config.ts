import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

const isCI = process.env.CI === "1" || process.env.CI === "true";

export default defineConfig({
  resolve: {
    alias: {
      "@vertex-grid/core": fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      "@vertex-grid/ingestion": fileURLToPath(new URL("./ingestion/src/api.ts", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts", "ingestion/tests/**/*.test.ts"],
    pool: "forks",
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
  },
});
