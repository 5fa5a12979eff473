import { defineConfig, defineProject } from "vitest/config";

import { aliases } from "./vitest.aliases";

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["**/*.test.ts"],
    exclude: defaultExclude,
    projects: [
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "verify-harness",
          include: ["packages/verify-harness/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "cli",
          include: ["packages/cli/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
    ],
  },
});
