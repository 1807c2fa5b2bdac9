import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["lib/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    pool: "forks",
  },
});
