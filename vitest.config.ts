import { defineConfig } from "vitest/config";

// Epoch timestamps resolve to the local day; pin the zone so those tests are exact.
process.env.TZ = "America/Los_Angeles";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: { TZ: "America/Los_Angeles" }
  }
});
