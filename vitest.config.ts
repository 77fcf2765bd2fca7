import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["calc-main/tests/**/*.test.ts", "calc-cli/tests/**/*.test.ts"],
    environment: "node",
  },
});
