import swc from "unplugin-swc";
import { defineConfig, mergeConfig } from "vitest/config";

import sharedConfig from "../../vitest.shared";

export default mergeConfig(
  sharedConfig,
  defineConfig({
    test: {
      name: "backend-shared",
      include: ["src/**/*.test.ts", "src/**/*.spec.ts"],
    },
    plugins: [
      swc.vite({
        module: { type: "es6" },
        jsc: {
          parser: {
            syntax: "typescript",
            decorators: true,
          },
          transform: {
            decoratorMetadata: true,
            legacyDecorator: true,
          },
        },
      }),
    ],
  }),
);
