import { resolve } from "node:path";

import { defineConfig } from "vitest/config";

/**
 * Shared Vitest configuration for the workspace.
 * Per-package configs should use mergeConfig to extend this.
 *
 * Workspace packages resolve to their TypeScript sources, so tests never
 * need a build first.
 *
 * @example
 * import { mergeConfig } from 'vitest/config';
 * import sharedConfig from '../../vitest.shared';
 * export default mergeConfig(sharedConfig, defineConfig({ ... }));
 */
export default defineConfig({
  resolve: {
    alias: {
      "@idmap/backend-shared": resolve(
        __dirname,
        "packages/backend-shared/src/index.ts",
      ),
      "@idmap/sql-mapper": resolve(__dirname, "packages/sql-mapper/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      NODE_ENV: "test",
      LOG_FORMAT: "text",
    },
  },
});
