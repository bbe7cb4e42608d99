import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: true,
    setupFiles: [],
    env: {
      MYSQL_HOST: "",
      MYSQL_DATABASE: "decisioning_heatwave",
      MYSQL_CONNECT_RETRIES: "0",
      AUTO_VIEW_OPTIMIZATION: "true",
      VIEW_PERFORMANCE_MONITORING: "true",
      ENABLE_OTEL: "false"
    }
  }
});
