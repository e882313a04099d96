import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cli/focusline/src/**/*.test.ts"],
    environment: "node",
  },
});
