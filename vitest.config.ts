import { defineConfig } from "vitest/config";

/**
 * Root Vitest configuration with workspace projects.
 *
 * Each workspace package has its own vitest.config.ts that extends
 * vitest.shared.ts. Run one project with `npx vitest --project sql-mapper`.
 */
export default defineConfig({
  test: {
    reporters: ["default"],
    projects: [
      "apps/batch/vitest.config.ts",
      "packages/backend-shared/vitest.config.ts",
      "packages/sql-mapper/vitest.config.ts",
    ],
  },
});
