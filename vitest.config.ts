import path from "path";

import { defineConfig } from "vitest/config";

const src = (dir: string): string => path.resolve(__dirname, "src", dir);

export default defineConfig({
  resolve: {
    alias: {
      "@config": src("config"),
      "@domain": src("domain"),
      "@infrastructure": src("infrastructure"),
      "@app": src("app"),
      "@interfaces": src("interfaces"),
      "@middleware": src("middleware"),
      "@routes": src("routes"),
      "@utils": src("utils"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "error",
      LOG_TO_FILE: "false",
    },
  },
});
