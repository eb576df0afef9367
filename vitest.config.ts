import { defineConfig } from "vitest/config";

// Day keys are computed in the process zone; pin it for the workers.
process.env.TZ = "UTC";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    env: { TZ: "UTC" },
  },
});
