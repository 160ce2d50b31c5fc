// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Only COREIL_* variables reach the tests
  const env = loadEnv(mode, process.cwd(), "COREIL_");

  return {
    test: {
      env,
      testTimeout: 20_000,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
