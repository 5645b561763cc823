// vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import path from "node:path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/services/systemd-control/test/**/*.spec.ts"],
    setupFiles: ["backend/services/systemd-control/test/setup.ts"],
    hookTimeout: 30000,
    testTimeout: 30000,
    restoreMocks: true,
    watch: false,
    reporters: ["default"],
  },
  resolve: {
    alias: {
      // e.g. import "@shared/utils/logger"
      "@shared": path.resolve(process.cwd(), "backend/services/shared/src"),
    },
  },
});
