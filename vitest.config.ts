import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "sdks/sdk-ts/src/**/__tests__/**/*.test.ts",
      "apps/download-service/src/**/__tests__/**/*.test.ts",
    ],
    environment: "node",
  },
});
