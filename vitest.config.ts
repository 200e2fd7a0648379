import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  esbuild: {
    jsx: "automatic",
    jsxImportSource: "tessel",
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.spec.{ts,tsx}"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    clearMocks: true,
    restoreMocks: true,
    env: {
      TESSEL_LOG_LEVEL: "silent",
    },
  },
  resolve: {
    alias: {
      "tessel/jsx-runtime": fromRoot("./packages/core/src/jsx/jsx-runtime.ts"),
      "tessel/jsx-dev-runtime": fromRoot("./packages/core/src/jsx/jsx-runtime.ts"),
      "tessel/bootloader": fromRoot("./packages/core/src/hydration/bootloader-entry.ts"),
      "tessel-kernel": fromRoot("./packages/kernel/src/index.ts"),
      "tessel-shared": fromRoot("./packages/shared/src/index.ts"),
    },
  },
});
