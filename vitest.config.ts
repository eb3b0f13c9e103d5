import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@unillm/types": pkg("types"),
      "@unillm/providers": pkg("providers"),
      "@unillm/core": pkg("core"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
  },
});
