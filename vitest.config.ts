import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@template-tracking/vision-core": fileURLToPath(
        new URL("./packages/vision-core/src/index.ts", import.meta.url)
      ),
      "@template-tracking/tracker": fileURLToPath(
        new URL("./packages/template-tracker/src/index.ts", import.meta.url)
      )
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"]
  }
});
