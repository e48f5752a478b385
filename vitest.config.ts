import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "mqtt-docstore-bridge",
    environment: "node",
    include: ["test/**/*.test.ts"],
    env: {
      LOG_SILENT: "true",
    },
  },
});
