import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    clearMocks: true,
    // Retry and render-failure paths log warnings; keep test output clean.
    env: { LOG_LEVEL: "SILENT" },
  },
});
