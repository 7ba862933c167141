import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "types",
    watch: false,
    globals: false,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
