// vitest.config.mts
//
// Vitest configuration for reportcalc.
// - Node environment, global test functions
// - tests/setupTests.ts silences the pino logger
// - Path aliases via tsconfig (and a direct @ → src alias)

import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
  plugins: [tsconfigPaths()],

  resolve: {
    alias: {
      "@": resolve(__dirname, "src"),
    },
  },

  test: {
    globals: true,
    environment: "node",

    include: ["tests/**/*.spec.ts"],
    exclude: ["node_modules", "dist", "coverage", ".git"],

    setupFiles: ["./tests/setupTests.ts"],

    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/index.ts"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
  },
});
