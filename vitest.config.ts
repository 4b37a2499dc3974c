import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@/": fromRoot("./src/"),
      "~shared/": fromRoot("./deps/shared/src/"),
      "~test/": fromRoot("./test/"),
    },
  },
  test: {
    include: ["test/**/*.test.ts", "deps/shared/test/**/*.test.ts"],
  },
});
