import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["./types/vitest.config.ts", "./cli/vitest.config.ts"],
  },
});
