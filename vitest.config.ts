// vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/services/**/test/**/*.spec.ts"],
    setupFiles: ["backend/services/test/setup.ts"],
    hookTimeout: 30_000,
    testTimeout: 30_000,
  },
});
