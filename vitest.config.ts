import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["stratactl/test/**/*.test.ts"],
    environment: "node",
  },
});
