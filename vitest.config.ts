import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["episode_data/**/*.spec.ts"],
    testTimeout: 20000,
  },
});
