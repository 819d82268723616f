import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@teststand/shared/utils": fromRoot("./packages/shared/src/utils/index.ts"),
      "@teststand/shared": fromRoot("./packages/shared/src/index.ts"),
      "@teststand/telemetry": fromRoot("./packages/telemetry/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/**/src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/*.test.ts",
        "**/index.ts",
        "**/types.ts",
      ],
    },
    testTimeout: 15000,
    hookTimeout: 10000,
    pool: "forks",
    fileParallelism: true,
  },
});
