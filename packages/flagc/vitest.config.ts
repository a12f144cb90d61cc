import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = fileURLToPath(new URL("./src", import.meta.url));
const test = fileURLToPath(new URL("./test", import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
  },
  resolve: {
    alias: [
      { find: /^#test\/(.*)$/, replacement: `${test}/$1` },
      { find: /^#(.*)$/, replacement: `${src}/$1` },
    ],
  },
});
