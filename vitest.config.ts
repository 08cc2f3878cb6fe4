import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/tests/**/*.spec.ts"],
    setupFiles: ["src/tests/setup.ts"],
    environment: "node",
  },
});
