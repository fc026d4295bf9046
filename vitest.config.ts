import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    testTimeout: 15_000,
    server: {
      deps: {
        // clipanion's ESM build uses a directory import ("../platform") that
        // Node's ESM loader rejects; let Vite resolve it instead.
        inline: ["clipanion"],
      },
    },
  },
});
