import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages export their TypeScript sources; tests never need a dist build.
      "@emberfall/battle-engine": fromRoot("./packages/battle-engine/src/index.ts"),
      "@emberfall/content": fromRoot("./packages/content/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.{test,spec}.ts"],
  },
});
