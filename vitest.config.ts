import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspaceEntry = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@gpsart/domain": workspaceEntry("./packages/domain/src/index.ts"),
      "@gpsart/gpx": workspaceEntry("./packages/gpx/src/index.ts"),
      "@gpsart/svg": workspaceEntry("./packages/svg/src/index.ts"),
      "@gpsart/shape-engine": workspaceEntry("./packages/shape-engine/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts", "apps/*/tests/**/*.test.ts"],
    watch: false,
    testTimeout: 10000
  }
});
