import { configDefaults, defineConfig } from "vitest/config";

const integration = process.env.RUN_INTEGRATION === "1";

export default defineConfig({
  test: {
    environment: "node",
    include: integration ? ["tests/integration/**/*.test.ts"] : ["tests/**/*.test.ts"],
    exclude: integration ? configDefaults.exclude : [...configDefaults.exclude, "tests/integration/**"],
    env: { LOG_LEVEL: "warn" },
    testTimeout: 30_000
  }
});
