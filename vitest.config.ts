import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const dir = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@audio": dir("./app/audio"),
      "@bindings": dir("./app/bindings"),
      "@config": dir("./app/config"),
      "@graph": dir("./app/graph"),
      "@notation": dir("./app/notation"),
      "@session": dir("./app/session"),
      "@units": dir("./app/units")
    }
  },
  test: {
    include: ["app/tests/**/*.test.ts"],
    environment: "node"
  }
});
