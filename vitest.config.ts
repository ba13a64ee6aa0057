import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.spec.ts"],
    reporters: ["default"],
    env: {
      LOG_LEVEL: "warn",
    },
  },
});
