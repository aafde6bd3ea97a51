import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@busbench\/sim\/matchers$/, replacement: src("./packages/sim/src/matchers.ts") },
      { find: /^@busbench\/sim$/, replacement: src("./packages/sim/src/index.ts") },
      { find: /^@busbench\/i2c$/, replacement: src("./packages/i2c/src/index.ts") },
    ],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "test/**/*.test.ts"],
    testTimeout: 20_000,
  },
});
