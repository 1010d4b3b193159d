import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["cli/src/**/*.test.ts"],
    restoreMocks: true,
  },
});
