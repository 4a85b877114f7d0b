import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.vitest.ts"],
    restoreMocks: true,
    unstubGlobals: true,
    env: {
      NODE_ENV: "test",
      MCP_LOG_LEVEL: "error",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      exclude: ["node_modules/", "dist/", "tests/"],
    },
  },
});
