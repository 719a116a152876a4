import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    restoreMocks: true,
    clearMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,

    // Filter dotenv tips so the run output stays readable
    onConsoleLog(log: string) {
      if (/\[dotenv@/i.test(log) || /\[dotenvx@/i.test(log) || /tip:/i.test(log)) {
        return false;
      }
      return true;
    },

    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "html"],
      exclude: ["tests/**", "**/*.test.ts", "scripts/**", "dist/**"],
      thresholds: {
        lines: 60,
        functions: 55,
        branches: 50,
        statements: 60,
      },
    },
  },
});
