import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
  },
  resolve: {
    alias: {
      // Use SOURCE for local packages so tests don't depend on dist/
      "@tilefont/log": src("./packages/log/src/index.ts"),
      "@tilefont/config": src("./packages/config/src/index.ts"),
      "@tilefont/atlas-compose": src("./packages/atlas-compose/src/index.ts"),
    },
  },
});
