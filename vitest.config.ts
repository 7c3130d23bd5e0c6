import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // Tests create cache directories under the working directory
    fileParallelism: false,
    testTimeout: 10000,
  },
});
