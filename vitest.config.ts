import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["config/**/*.test.ts", "stages/**/test/**/*.test.ts"],
    environment: "node",
  },
});
