import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["alert-service/test/**/*.test.ts"],
    restoreMocks: true,
  },
});
