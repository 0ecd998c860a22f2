import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "coda-export",
    include: ["./src/**/*.test.ts"],
    environment: "node",
    bail: 5,
    maxConcurrency: 10,
    passWithNoTests: false,
    isolate: true,
    silent: false,
    hideSkippedTests: true,
    testTimeout: 15_000
  }
});
