import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["trading-gateway/src/**/*.test.ts"],
    env: { LOG_LEVEL: "silent" },
  },
});
