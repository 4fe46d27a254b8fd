import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@detfetch/common": fileURLToPath(new URL("./packages/detfetch-common/src/index.ts", import.meta.url))
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    pool: "forks"
  }
});
