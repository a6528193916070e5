import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspaceSource = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  resolve: {
    alias: [
      { find: /^@callboard\/contracts$/, replacement: workspaceSource("./packages/contracts/src/index.ts") },
      { find: /^@callboard\/core\/dashboard$/, replacement: workspaceSource("./packages/core/src/dashboard.ts") },
      { find: /^@callboard\/core$/, replacement: workspaceSource("./packages/core/src/index.ts") },
      { find: /^@callboard\/server$/, replacement: workspaceSource("./apps/server/src/index.ts") },
    ],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.{ts,tsx}"],
    environment: "node",
  },
});
