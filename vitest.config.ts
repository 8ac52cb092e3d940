import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts"],
    // Each suite boots an in-memory Postgres and runs the migrations.
    hookTimeout: 30_000,
    coverage: {
      exclude: [
        "database/**/*",
        "src/dev-tools/**/*",
        ".config/**/*",
        "*.config.ts",
        "src/index.ts",
        "src/workers/**/*",
      ],
    },
  },
});
