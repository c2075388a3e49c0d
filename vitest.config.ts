import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    // Tests run against sources; no build needed
    alias: {
      "@modelhost/protocol": source("protocol"),
      "@modelhost/commands": source("commands"),
      "@modelhost/server": source("server"),
      "@modelhost/client": source("client"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    testTimeout: 10_000,
  },
});
