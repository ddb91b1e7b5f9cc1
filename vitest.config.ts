import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["portseed-cli/src/**/*.test.ts"],
    environment: "node",
  },
});
