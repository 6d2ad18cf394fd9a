import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: [
        "src/update/**",
        "src/backup/**",
        "src/migrations/**",
        "src/installation/**",
      ],
      exclude: ["src/**/__tests__/**", "src/schemas/**"],
    },
  },
});
