import { defineConfig } from "vitest/config";

const baseVitestConfig = defineConfig({
  test: {
    globals: true,
    include: ["src/**/*.test.ts"],
    reporters: "default",
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/index.ts"]
    }
  }
});

export default baseVitestConfig;
