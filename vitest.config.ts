import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    alias: {
      "@pyvm/logger": pkg("logger"),
      "@pyvm/core": pkg("core"),
      "@pyvm/updater": pkg("updater"),
    },
  },
});
