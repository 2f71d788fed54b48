import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Window and range arithmetic uses local-time date-fns helpers
process.env.TZ = "UTC";

const root = (path: string): string =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@calsync/shared": root("./packages/shared/src/index.ts"),
      "@calsync/store": root("./packages/store/src/index.ts"),
      "@calsync/timeline": root("./packages/timeline/src/index.ts"),
      "@calsync/sync-worker": root("./workers/sync/src/index.ts"),
      "@calsync/workflow-archive-import": root(
        "./workflows/archive-import/src/index.ts",
      ),
      "@calsync/workflow-cache-lifecycle": root(
        "./workflows/cache-lifecycle/src/index.ts",
      ),
      "@calsync/api": root("./workers/api/src/index.ts"),
    },
  },
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "workers/*/src/**/*.test.ts",
      "workflows/*/src/**/*.test.ts",
    ],
    environment: "node",
  },
});
