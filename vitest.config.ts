import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // The feed server tests bind ephemeral ports; keep files sequential.
    fileParallelism: false,
  },
});
