import path from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      backend: path.resolve(root, "backend"),
      "@shared": path.resolve(root, "shared"),
    },
  },
  test: {
    environment: "node",
    include: ["backend/**/*.test.ts", "shared/**/*.test.ts"],
    testTimeout: 10000,
  },
});
