import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["index.test.ts", "pgx/**/*.test.ts"],
    exclude: ["node_modules/**"],
  },
});
