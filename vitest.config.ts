import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Run workspace packages from source so tests need no build
    alias: {
      "@classic-ciphers/codec": fileURLToPath(
        new URL("./packages/codec/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
  },
});
