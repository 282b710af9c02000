import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Tests mutate process.env and the debug channel config
    pool: "forks",
    alias: {
      "@shaderweave/core": src("core"),
      "@shaderweave/extensions": src("extensions"),
      "@shaderweave/lookup": src("lookup"),
      "@shaderweave/vite-plugin": src("vite-plugin"),
    },
  },
});
