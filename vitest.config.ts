import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@lp-builds/shared": pkg("shared"),
      "@lp-builds/launchpad": pkg("launchpad"),
      "@lp-builds/receiver": pkg("receiver"),
    },
  },
});
