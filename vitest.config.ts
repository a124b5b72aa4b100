import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    // The program runner calls process.chdir, which worker threads reject.
    pool: "forks",
    restoreMocks: true,
    testTimeout: 10000,
  },
});
