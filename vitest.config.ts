// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/*/src/**/*.test.ts",
      "backend/services/*/test/**/*.spec.ts",
    ],
    setupFiles: ["backend/services/shared/test/setup.ts"],
  },
});
