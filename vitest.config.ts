import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "seller-insights-server/src/**/__tests__/**/*.test.ts",
      "shared/*/src/**/__tests__/**/*.test.ts",
    ],
    exclude: ["node_modules/**", "dist/**"],
    environment: "node",
    globals: true,
    env: {
      OTEL_SDK_DISABLED: "true",
    },
  },
});
