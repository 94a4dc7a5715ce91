import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["tests/**/*.test.ts"],
    env: {
      // Keep colour codes out of asserted log lines.
      FORCE_COLOR: "0",
    },
  },
});
