// vitest.config.mts
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    include: ["backend/services/**/*.{test,spec}.ts"],
    reporters: ["default"],
    testTimeout: 15_000,
  },
});
