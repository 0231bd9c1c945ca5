import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    env: {
      SUPERINTENDENT_LOG_LEVEL: "fatal",
    },
  },
});
